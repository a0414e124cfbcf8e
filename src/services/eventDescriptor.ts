// src/services/eventDescriptor.ts
import { addMinutes, format, isValid, parseISO } from "date-fns";
import { MalformedEventError } from "../lib/errors.js";
import type { EventDescriptor, EventSource } from "../types/events.js";
import { parseRecurrence } from "./recurrence.js";

/** Loosely-typed candidate, as produced by the model or the rules */
export type RawEvent = {
  title: string;
  start: string;
  end?: string | null;
  allDay?: boolean;
  location?: string | null;
  notes?: string | null;
  /** Repeat phrase such as "every Monday"; unrecognized phrases are dropped */
  recurrence?: string | null;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
// YYYY-MM-DDTHH:mm, optional :ss(.sss), optional Z or offset
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

export function toLocalDate(d: Date): string {
  return format(d, "yyyy-MM-dd");
}

export function toLocalDateTime(d: Date): string {
  return format(d, "yyyy-MM-dd'T'HH:mm:ss");
}

/**
 * Parses a date or date-time string into a local Date.
 * Zone-less values are wall-clock local time; Z/offset values are converted.
 */
export type ParsedLocal = {
  date: Date;
  dateOnly: boolean;
  /** The calendar date as written, before any zone conversion */
  day: string;
};

export function parseLocal(value: string): ParsedLocal | null {
  const s = value.trim();
  if (DATE_ONLY.test(s)) {
    const date = parseISO(s);
    return isValid(date) ? { date, dateOnly: true, day: s } : null;
  }
  if (DATE_TIME.test(s)) {
    const date = parseISO(s.replace(" ", "T"));
    return isValid(date) ? { date, dateOnly: false, day: s.slice(0, 10) } : null;
  }
  return null;
}

export function normalizeEvent(raw: RawEvent, source: EventSource): EventDescriptor {
  const title = raw.title.replace(/\s+/g, " ").trim();
  if (!title) throw new MalformedEventError("event title is empty");

  const start = parseLocal(raw.start);
  if (!start) throw new MalformedEventError(`unrecognized start "${raw.start}"`);

  const end = raw.end ? parseLocal(raw.end) : null;
  if (raw.end && !end) throw new MalformedEventError(`unrecognized end "${raw.end}"`);

  const allDay = Boolean(raw.allDay) || start.dateOnly;
  // All-day dates are taken as written: "2026-10-20T00:00:00Z" is the 20th
  // everywhere, not the 19th west of UTC
  const render = (p: ParsedLocal) => (allDay ? p.day : toLocalDateTime(p.date));

  const startStr = render(start);
  let endStr = end ? render(end) : undefined;

  // Drop an inverted range and keep the start
  if (endStr !== undefined && endStr < startStr) endStr = undefined;
  // A timed end equal to start carries nothing
  if (!allDay && endStr === startStr) endStr = undefined;

  const location = raw.location?.trim();
  const recurrence = raw.recurrence ? parseRecurrence(raw.recurrence) : null;

  return {
    title,
    start: startStr,
    end: endStr,
    allDay,
    location: location ? location : undefined,
    recurrence: recurrence ?? undefined,
    notes: raw.notes?.trim() ?? "",
    source,
  };
}

export function startDate(event: EventDescriptor): Date {
  const parsed = parseLocal(event.start);
  if (!parsed) throw new MalformedEventError(`unrecognized start "${event.start}"`);
  return parsed.date;
}

/**
 * End of the event as a Date. All-day events return their last (inclusive)
 * day; timed events without an end last `defaultDurationMinutes`.
 */
export function effectiveEnd(event: EventDescriptor, defaultDurationMinutes: number): Date {
  const start = startDate(event);
  const parsedEnd = event.end ? parseLocal(event.end) : null;
  if (event.allDay) return parsedEnd ? parsedEnd.date : start;
  return parsedEnd ? parsedEnd.date : addMinutes(start, defaultDurationMinutes);
}
