// src/services/render/fantastical.ts
// Fantastical gets a sentence for its own parser. Dates are spelled out in
// full ("Tuesday, October 20, 2026") and times in 12-hour form ("12 pm"),
// the shapes its parser reads without guessing.
import { format, isSameDay } from "date-fns";
import type { EventDescriptor } from "../../types/events.js";
import { effectiveEnd, startDate } from "../eventDescriptor.js";
import { spellRecurrence } from "../recurrence.js";
import { quote } from "./applescript.js";

export type FantasticalOptions = {
  calendarName: string | null;
};

function spellDate(d: Date): string {
  return format(d, "EEEE, MMMM d, yyyy");
}

/** "2 pm", "3:30 pm", "12 am" */
export function spellTime(d: Date): string {
  return d.getMinutes() === 0 ? format(d, "h aaa") : format(d, "h:mm aaa");
}

export function buildFantasticalSentence(event: EventDescriptor): string {
  const start = startDate(event);
  const parts = [event.title];

  if (event.allDay) {
    const last = effectiveEnd(event, 0);
    if (isSameDay(start, last)) {
      parts.push(`on ${spellDate(start)}`, "all day");
    } else {
      parts.push(`from ${format(start, "MMMM d, yyyy")} to ${format(last, "MMMM d, yyyy")}`, "all day");
    }
  } else if (event.end) {
    const end = effectiveEnd(event, 0);
    parts.push(
      isSameDay(start, end)
        ? `on ${spellDate(start)} from ${spellTime(start)} to ${spellTime(end)}`
        : `from ${spellDate(start)} at ${spellTime(start)} to ${spellDate(end)} at ${spellTime(end)}`
    );
  } else {
    parts.push(`on ${spellDate(start)} at ${spellTime(start)}`);
  }

  if (event.recurrence) parts.push(spellRecurrence(event.recurrence));
  if (event.location) parts.push(`at ${event.location}`);
  return parts.join(" ");
}

export function renderFantastical(event: EventDescriptor, options: FantasticalOptions): string {
  const args = [`parse sentence ${quote(buildFantasticalSentence(event))}`];
  if (event.notes) args.push(`notes ${quote(event.notes)}`);
  if (options.calendarName) args.push(`calendarName ${quote(options.calendarName)}`);
  args.push("with add immediately");

  return ['tell application "Fantastical"', `  ${args.join(" ")}`, "end tell"].join("\n");
}
