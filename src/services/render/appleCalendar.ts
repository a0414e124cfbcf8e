// src/services/render/appleCalendar.ts
// Apple Calendar takes the fields as structured event properties.
import { addDays, startOfDay } from "date-fns";
import type { EventDescriptor } from "../../types/events.js";
import { effectiveEnd, startDate } from "../eventDescriptor.js";
import { toRRule } from "../recurrence.js";
import { dateAssignment, indent, quote } from "./applescript.js";

export type AppleCalendarOptions = {
  /** Target calendar; the first writable calendar when null */
  calendarName: string | null;
  defaultDurationMinutes: number;
};

export function renderAppleCalendar(event: EventDescriptor, options: AppleCalendarOptions): string {
  const start = startDate(event);
  const last = effectiveEnd(event, options.defaultDurationMinutes);
  // Calendar's all-day end is exclusive: midnight after the last day
  const end = event.allDay ? addDays(startOfDay(last), 1) : last;

  const properties = [
    `summary:${quote(event.title)}`,
    "start date:startDate",
    "end date:endDate",
    `allday event:${event.allDay}`,
  ];
  if (event.location) properties.push(`location:${quote(event.location)}`);
  if (event.notes) properties.push(`description:${quote(event.notes)}`);
  if (event.recurrence) properties.push(`recurrence:${quote(toRRule(event.recurrence))}`);

  const target = options.calendarName
    ? `set targetCalendar to calendar ${quote(options.calendarName)}`
    : "set targetCalendar to first calendar whose writable is true";

  return [
    ...dateAssignment("startDate", start),
    ...dateAssignment("endDate", end),
    'tell application "Calendar"',
    ...indent([
      target,
      "tell targetCalendar",
      ...indent([`make new event at end of events with properties {${properties.join(", ")}}`]),
      "end tell",
    ]),
    "end tell",
  ].join("\n");
}
