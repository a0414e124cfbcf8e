// src/services/extractDate/ruleEventExtractor.ts
// Deterministic fallback: regex + date-fns. Used when the model is unreachable,
// times out, or replies with something that is not an event.
//
// Strategy: find a repeat phrase, a date phrase, then a time phrase, then a
// duration, cutting each match out of the text. A trailing "at/in <Capitalized Words>" is the
// location and whatever is left is the title.
import { addDays, addMinutes, isBefore, nextDay, startOfDay, type Day } from "date-fns";
import type { Recurrence, ResolvedExtraction } from "../../types/events.js";
import { normalizeEvent, toLocalDate, toLocalDateTime } from "../eventDescriptor.js";
import { parseRecurrence, RECURRENCE } from "../recurrence.js";

const MONTHS =
  "jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?";
const MONTH_KEYS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];
const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

const ORD = "(?:st|nd|rd|th)?";
const DATE_DASH = "\\s*(?:-|–|—|to|until|through)\\s*";
const TIME_DASH = "\\s*(?:-|–|—|to|until)\\s*";
const YEAR = "(?:,?\\s+(\\d{4}))?";

// 24 August - 2 September [2027]
const RANGE_CROSS_MONTH = new RegExp(
  `\\b(?:from\\s+)?(\\d{1,2})${ORD}\\s+(?:of\\s+)?(${MONTHS})${DATE_DASH}(\\d{1,2})${ORD}\\s+(?:of\\s+)?(${MONTHS})\\b${YEAR}`,
  "i"
);
// 24-30 August [2027]
const RANGE_DAY_FIRST = new RegExp(
  `\\b(?:from\\s+)?(\\d{1,2})${ORD}${DATE_DASH}(\\d{1,2})${ORD}\\s+(?:of\\s+)?(${MONTHS})\\b${YEAR}`,
  "i"
);
// August 24 - September 2 [2027]
const RANGE_CROSS_MONTH_MONTH_FIRST = new RegExp(
  `\\b(?:from\\s+)?(${MONTHS})\\s+(\\d{1,2})${ORD}${DATE_DASH}(${MONTHS})\\s+(\\d{1,2})${ORD}\\b${YEAR}`,
  "i"
);
// August 24-30 [2027]
const RANGE_MONTH_FIRST = new RegExp(
  `\\b(?:from\\s+)?(${MONTHS})\\s+(\\d{1,2})${ORD}${DATE_DASH}(\\d{1,2})${ORD}\\b${YEAR}`,
  "i"
);

const ISO_DATE = /\b(?:on\s+)?(\d{4})-(\d{2})-(\d{2})\b/i;                                   // 2026-11-03
// 11/3[/2026]; not "1/2 of the book"
const US_DATE = /\b(?:on\s+)?(?<![\w/])(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?(?![\w/])(?!\s+of\b)/i;
// 3 November; not the "30" of "10:30 May"
const DAY_MONTH = new RegExp(`\\b(?:on\\s+)?(?:the\\s+)?(?<![:./])(\\d{1,2})${ORD}\\s+(?:of\\s+)?(${MONTHS})\\b${YEAR}`, "i");
// November 3; not "May 12:30"
const MONTH_DAY = new RegExp(`\\b(?:on\\s+)?(${MONTHS})\\s+(\\d{1,2})${ORD}\\b(?![:.]\\d)${YEAR}`, "i");
const RELATIVE_DAY = /\b(?:on\s+)?(day after tomorrow|today|tonight|tomorrow|tmrw)\b/i;
const WEEKDAY = /\b(?:on\s+)?(?:(?:this|next|coming)\s+)?(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/i;

// Times like "2-3pm", "from 9:30am to 11am", "14:00-15:30"
const TIME_RANGE = new RegExp(
  `(?:\\b(?:from|at|between)\\s+)?\\b(\\d{1,2})(?::(\\d{2}))?\\s*(am|pm)?${TIME_DASH}(\\d{1,2})(?::(\\d{2}))?\\s*(am|pm)?\\b`,
  "gi"
);
// "3pm", "at 3:30 pm", "@ 7am"
const TIME_MERIDIEM = /(?:\bat\s+|@\s*)?\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i;
const TIME_NOON_MIDNIGHT = /(?:\bat\s+|@\s*)?\b(noon|midnight)\b/i;
const TIME_24H = /(?:\bat\s+|@\s*)?\b([01]?\d|2[0-3]):([0-5]\d)\b/i;
// "at 7", read only when a part of day settles am/pm
const BARE_HOUR = /(?:\bat\s+|@\s*)(\d{1,2})\b(?![:.]\d)/i;
// "night" only as "at night", so "Game night" stays a title
const PART_OF_DAY = /\b(?:in\s+the\s+|this\s+)?(morning|afternoon|evening)\b|\bat\s+(night)\b/i;

const DURATION = /\bfor\s+(\d+(?:\.\d+)?)\s*(minutes?|mins?|m|hours?|hrs?|h)\b/i;
const DURATION_WORDS = /\bfor\s+(half\s+an|an?|one)\s+hour\b/i;

const LOCATION = /\s(?:at|in|@)\s+((?:the\s+)?[A-Z][\w'’&.-]*(?:\s+(?:[A-Z0-9][\w'’&.-]*|of|the|and|de|la))*)$/;

const CONNECTOR_HEAD = /^(?:on|at|from|for|in|@|-|–|,)\s+/i;
const CONNECTOR_TAIL = /\s+(?:on|at|from|for|in|@|-|–)$/i;

/** Hour used when only a part of day is given */
const PART_OF_DAY_HOURS: Record<string, number> = {
  morning: 9,
  afternoon: 14,
  evening: 18,
  night: 20,
  tonight: 20,
};

const DEFAULT_TITLE = "New Event";

type Clock = { h: number; m: number };

type TimeHit = { start: Clock; end?: Clock; hasMeridiem: boolean };

type DateHit =
  | { kind: "range"; start: Date; end: Date | null }
  | { kind: "day"; day: Date; hourHint?: number };

/** Mutable view of the text that still has to be explained */
class Remainder {
  constructor(public text: string) {}

  cut(m: RegExpExecArray | RegExpMatchArray) {
    const at = m.index ?? 0;
    this.text = `${this.text.slice(0, at)} ${this.text.slice(at + m[0].length)}`;
  }

  take(re: RegExp): RegExpExecArray | null {
    const m = re.exec(this.text);
    if (m) this.cut(m);
    return m;
  }
}

export function extractRules(input: { text: string; now?: Date }): ResolvedExtraction {
  const now = input.now ?? new Date();
  const warnings: string[] = [];
  const rest = new Remainder(input.text.replace(/\s+/g, " ").trim());

  const repeat = RECURRENCE.exec(rest.text);
  // A leading "Weekly"/"Daily" names the event ("Weekly review") and stays in the title
  if (repeat && !(repeat[3] && repeat.index === 0)) rest.cut(repeat);
  const recurrence = repeat ? parseRecurrence(repeat[0]) : null;
  const dateHit = findDateRange(rest, now) ?? findDay(rest, now) ?? firstRepeatDay(recurrence, now);

  // Time phrases are cut even when the event ends up all-day, so they stay out of the title
  const explicit = findTime(rest);
  const partOfDay = findPartOfDay(rest) ?? (dateHit?.kind === "day" ? dateHit.hourHint : undefined);
  const bare = !explicit && partOfDay !== undefined ? findBareHour(rest) : null;
  const minutes = findDuration(rest);

  let start: string;
  let end: string | undefined;
  let allDay = false;

  if (dateHit?.kind === "range") {
    allDay = true;
    start = toLocalDate(dateHit.start);
    end = dateHit.end ? toLocalDate(dateHit.end) : undefined;
  } else {
    const dayHit = dateHit?.kind === "day" ? dateHit : null;
    const base = dayHit ? dayHit.day : startOfDay(now);
    const timing = resolveTiming(explicit, bare, partOfDay);

    if (timing) {
      const startAt = atClock(base, timing.start);
      let endAt = timing.end ? atClock(base, timing.end) : null;
      // "11pm-1am" runs past midnight
      if (endAt && !isBefore(startAt, endAt)) endAt = addDays(endAt, 1);
      if (!endAt && minutes) endAt = addMinutes(startAt, minutes);

      start = toLocalDateTime(startAt);
      end = endAt ? toLocalDateTime(endAt) : undefined;
    } else {
      allDay = true;
      start = toLocalDate(base);
      if (!dayHit && !recurrence) warnings.push("no date or time found; created an all-day event today");
    }
  }

  const { title, location } = splitTitleAndLocation(rest.text);

  const event = normalizeEvent(
    { title: title || DEFAULT_TITLE, start, end, allDay, location, recurrence: repeat?.[0] },
    "rules"
  );
  return { event, degraded: false, warnings };
}

/* ============================== Dates ============================== */

function findDateRange(rest: Remainder, now: Date): DateHit | null {
  let m = RANGE_CROSS_MONTH.exec(rest.text);
  if (m) {
    const hit = crossMonthRange(monthIndex(m[2]), Number(m[1]), monthIndex(m[4]), Number(m[3]), m[5], now);
    if (hit) {
      rest.cut(m);
      return hit;
    }
  }

  m = RANGE_CROSS_MONTH_MONTH_FIRST.exec(rest.text);
  if (m) {
    const hit = crossMonthRange(monthIndex(m[1]), Number(m[2]), monthIndex(m[3]), Number(m[4]), m[5], now);
    if (hit) {
      rest.cut(m);
      return hit;
    }
  }

  m = RANGE_DAY_FIRST.exec(rest.text);
  if (m) {
    const hit = monthRange(monthIndex(m[3]), Number(m[1]), Number(m[2]), m[4], now);
    if (hit) {
      rest.cut(m);
      return hit;
    }
  }

  m = RANGE_MONTH_FIRST.exec(rest.text);
  if (m) {
    const hit = monthRange(monthIndex(m[1]), Number(m[2]), Number(m[3]), m[4], now);
    if (hit) {
      rest.cut(m);
      return hit;
    }
  }

  return null;
}

/**
 * A range over two months. A trailing year belongs to the end date; without
 * one the start resolves as usual and "28 December - 3 January" ends the
 * following year.
 */
function crossMonthRange(
  startMonth: number,
  startDay: number,
  endMonth: number,
  endDay: number,
  year: string | undefined,
  now: Date
): DateHit | null {
  if (year) {
    const y = fullYear(year);
    const end = new Date(y, endMonth, endDay);
    let start = new Date(y, startMonth, startDay);
    if (isBefore(end, start)) start = new Date(y - 1, startMonth, startDay);
    const valid = isCalendarDay(start, startMonth, startDay) && isCalendarDay(end, endMonth, endDay);
    return valid ? { kind: "range", start, end } : null;
  }

  const start = resolveDate(startMonth, startDay, undefined, now);
  if (!start) return null;
  let end = new Date(start.getFullYear(), endMonth, endDay);
  if (isBefore(end, start)) end = new Date(start.getFullYear() + 1, endMonth, endDay);
  return isCalendarDay(end, endMonth, endDay) ? { kind: "range", start, end } : null;
}

function monthRange(month: number, from: number, to: number, year: string | undefined, now: Date): DateHit | null {
  const start = resolveDate(month, from, year, now);
  if (!start) return null;
  const end = new Date(start.getFullYear(), month, to);
  const endOk = isCalendarDay(end, month, to) && !isBefore(end, start);
  return { kind: "range", start, end: endOk ? end : null };
}

function findDay(rest: Remainder, now: Date): DateHit | null {
  let m = ISO_DATE.exec(rest.text);
  if (m) {
    const day = resolveDate(Number(m[2]) - 1, Number(m[3]), m[1], now);
    if (day) return cutDay(rest, m, day);
  }

  m = US_DATE.exec(rest.text);
  if (m) {
    const day = resolveDate(Number(m[1]) - 1, Number(m[2]), m[3], now);
    if (day) return cutDay(rest, m, day);
  }

  m = DAY_MONTH.exec(rest.text);
  if (m) {
    const day = resolveDate(monthIndex(m[2]), Number(m[1]), m[3], now);
    if (day) return cutDay(rest, m, day);
  }

  m = MONTH_DAY.exec(rest.text);
  if (m) {
    const day = resolveDate(monthIndex(m[1]), Number(m[2]), m[3], now);
    if (day) return cutDay(rest, m, day);
  }

  m = rest.take(RELATIVE_DAY);
  if (m) {
    const word = m[1].toLowerCase();
    const today = startOfDay(now);
    if (word === "today") return { kind: "day", day: today };
    if (word === "tonight") return { kind: "day", day: today, hourHint: PART_OF_DAY_HOURS.tonight };
    if (word === "day after tomorrow") return { kind: "day", day: addDays(today, 2) };
    return { kind: "day", day: addDays(today, 1) };
  }

  // next/this weekday (defaults to next occurrence)
  m = rest.take(WEEKDAY);
  if (m) {
    const idx = WEEKDAYS.indexOf(m[1].toLowerCase());
    if (isWeekday(idx)) return { kind: "day", day: nextDay(startOfDay(now), idx) };
  }

  return null;
}

/** "every Monday" with no other date starts on the next matching day */
function firstRepeatDay(recurrence: Recurrence | null, now: Date): DateHit | null {
  if (!recurrence || recurrence.weekdays.length === 0) return null;
  const today = startOfDay(now);
  for (let i = 1; i <= 7; i++) {
    const day = addDays(today, i);
    if (recurrence.weekdays.includes(day.getDay())) return { kind: "day", day };
  }
  return null;
}

function cutDay(rest: Remainder, m: RegExpExecArray, day: Date): DateHit {
  rest.cut(m);
  return { kind: "day", day };
}

/**
 * Builds a local date. Without a year it takes the current year, or the next
 * one when that day has already passed.
 */
function resolveDate(month: number, day: number, year: string | undefined, now: Date): Date | null {
  if (month < 0 || month > 11 || day < 1 || day > 31) return null;

  if (year) {
    const d = new Date(fullYear(year), month, day);
    return isCalendarDay(d, month, day) ? d : null;
  }

  let d = new Date(now.getFullYear(), month, day);
  if (isBefore(d, startOfDay(now))) d = new Date(now.getFullYear() + 1, month, day);
  return isCalendarDay(d, month, day) ? d : null;
}

function fullYear(year: string): number {
  return year.length === 2 ? 2000 + Number(year) : Number(year);
}

// Rejects rollovers such as 31 September -> 1 October
function isCalendarDay(d: Date, month: number, day: number): boolean {
  return d.getMonth() === month && d.getDate() === day;
}

function monthIndex(name: string): number {
  return MONTH_KEYS.indexOf(name.slice(0, 3).toLowerCase());
}

function isWeekday(n: number): n is Day {
  return n >= 0 && n <= 6;
}

/* ============================== Times ============================== */

function toClock(hour: string, minute: string | undefined, meridiem: string | undefined): Clock | null {
  let h = parseInt(hour, 10);
  const m = minute ? parseInt(minute, 10) : 0;
  const ampm = meridiem?.toLowerCase();

  if (m > 59) return null;
  if (ampm) {
    if (h < 1 || h > 12) return null;
    if (ampm === "am" && h === 12) h = 0;
    if (ampm === "pm" && h !== 12) h += 12;
  } else if (h > 23) {
    return null;
  }
  return { h, m };
}

function minutesOf(c: Clock): number {
  return c.h * 60 + c.m;
}

/**
 * Clock for a range side written without am/pm: the other side's meridiem
 * when that keeps the range in order, else the opposite one ("9pm-1" ends at
 * 1am, past midnight).
 */
function inheritMeridiem(
  hour: string,
  minute: string | undefined,
  meridiem: string | undefined,
  inOrder: (c: Clock) => boolean
): Clock | null {
  const same = toClock(hour, minute, meridiem);
  if (!meridiem || (same && inOrder(same))) return same;
  const other = toClock(hour, minute, meridiem.toLowerCase() === "am" ? "pm" : "am");
  return other ?? same;
}

function rangeClocks(
  [h1, m1, ap1]: [string, string | undefined, string | undefined],
  [h2, m2, ap2]: [string, string | undefined, string | undefined]
): { start: Clock; end: Clock } | null {
  if (!ap1 && ap2) {
    // "11-1pm" is 11:00-13:00
    const end = toClock(h2, m2, ap2);
    const start = end && inheritMeridiem(h1, m1, ap2, (c) => minutesOf(c) < minutesOf(end));
    return start && end ? { start, end } : null;
  }
  // "11am-1" is 11:00-13:00
  const start = toClock(h1, m1, ap1);
  const end =
    start && (ap2 ? toClock(h2, m2, ap2) : inheritMeridiem(h2, m2, ap1, (c) => minutesOf(c) > minutesOf(start)));
  return start && end ? { start, end } : null;
}

function findTime(rest: Remainder): TimeHit | null {
  for (const m of rest.text.matchAll(TIME_RANGE)) {
    const [, h1, m1, ap1, h2, m2, ap2] = m;
    // Bare "1-2" is too ambiguous (room numbers, scores); need a meridiem or minutes on both sides
    if (!ap1 && !ap2 && !(m1 && m2)) continue;

    const clocks = rangeClocks([h1, m1, ap1], [h2, m2, ap2]);
    if (!clocks) continue;

    rest.cut(m);
    return { ...clocks, hasMeridiem: Boolean(ap1 || ap2) };
  }

  let m = TIME_MERIDIEM.exec(rest.text);
  const meridiem = m ? toClock(m[1], m[2], m[3]) : null;
  if (m && meridiem) {
    rest.cut(m);
    return { start: meridiem, hasMeridiem: true };
  }

  m = rest.take(TIME_NOON_MIDNIGHT);
  if (m) return { start: m[1].toLowerCase() === "noon" ? { h: 12, m: 0 } : { h: 0, m: 0 }, hasMeridiem: true };

  m = rest.take(TIME_24H);
  if (m) {
    const clock = toClock(m[1], m[2], undefined);
    if (clock) return { start: clock, hasMeridiem: false };
  }

  return null;
}

function findBareHour(rest: Remainder): Clock | null {
  const m = BARE_HOUR.exec(rest.text);
  const clock = m ? toClock(m[1], undefined, undefined) : null;
  if (m && clock) rest.cut(m);
  return clock;
}

/** "at 7" in the evening is 19:00, "at 2" at night is 02:00; 24-hour values pass through */
function toPartOfDay(clock: Clock, partOfDay: number): Clock {
  if (clock.h < 1 || clock.h > 12) return clock;
  const pm = partOfDay >= PART_OF_DAY_HOURS.night ? clock.h >= 6 && clock.h < 12 : partOfDay >= 12;
  return { h: (clock.h % 12) + (pm ? 12 : 0), m: clock.m };
}

function resolveTiming(
  explicit: TimeHit | null,
  bare: Clock | null,
  partOfDay: number | undefined
): { start: Clock; end?: Clock } | null {
  if (explicit) {
    if (explicit.hasMeridiem || partOfDay === undefined) return explicit;
    return {
      start: toPartOfDay(explicit.start, partOfDay),
      end: explicit.end && toPartOfDay(explicit.end, partOfDay),
    };
  }
  if (partOfDay === undefined) return null;
  return { start: bare ? toPartOfDay(bare, partOfDay) : { h: partOfDay, m: 0 } };
}

/** Hour for "in the morning", "this evening", "at night"; the phrase is cut even when an explicit time wins */
function findPartOfDay(rest: Remainder): number | undefined {
  const m = rest.take(PART_OF_DAY);
  if (!m) return undefined;
  return PART_OF_DAY_HOURS[(m[1] ?? m[2]).toLowerCase()];
}

function atClock(day: Date, clock: Clock): Date {
  const copy = new Date(day.getTime());
  copy.setHours(clock.h, clock.m, 0, 0);
  return copy;
}

/** Minutes from "for 90 minutes", "for 2 hours", "for 1.5h", "for half an hour" */
function findDuration(rest: Remainder): number | null {
  const words = rest.take(DURATION_WORDS);
  if (words) return /^half/i.test(words[1]) ? 30 : 60;

  const m = rest.take(DURATION);
  if (!m) return null;
  const amount = parseFloat(m[1]);
  const minutes = /^h/i.test(m[2]) ? amount * 60 : amount;
  return minutes > 0 ? Math.round(minutes) : null;
}

/* ============================== Title ============================== */

function tidy(text: string): string {
  let s = text.replace(/\s+/g, " ").trim().replace(/[\s,.;:!-]+$/, "");
  let prev = "";
  while (prev !== s) {
    prev = s;
    s = s.replace(CONNECTOR_HEAD, "").replace(CONNECTOR_TAIL, "").replace(/[\s,.;:!-]+$/, "").trim();
  }
  return s;
}

export function splitTitleAndLocation(text: string): { title: string; location?: string } {
  const cleaned = tidy(text);
  const m = LOCATION.exec(cleaned);
  if (!m) return { title: cleaned };
  return { title: tidy(cleaned.slice(0, m.index)), location: m[1].trim() };
}
