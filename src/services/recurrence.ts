// src/services/recurrence.ts
// Repeat phrases ("every Monday", "every other week", "daily") and the two
// forms the calendar apps take: an RRULE for Calendar, a phrase for Fantastical.
import type { Recurrence, RecurrenceFrequency } from "../types/events.js";

const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const BYDAY = ["SU", "MO", "TU", "WE", "TH", "FR", "SA"];
const WORKWEEK = [1, 2, 3, 4, 5];
const WEEKEND = [0, 6];

const UNITS: Record<string, RecurrenceFrequency> = {
  day: "daily",
  week: "weekly",
  month: "monthly",
  year: "yearly",
};

const ADVERBS: Record<string, RecurrenceFrequency> = {
  daily: "daily",
  weekly: "weekly",
  monthly: "monthly",
  yearly: "yearly",
  annually: "yearly",
};

const UNIT_WORDS: Record<RecurrenceFrequency, string> = {
  daily: "day",
  weekly: "week",
  monthly: "month",
  yearly: "year",
};

// "every [other|N] <unit|weekday>[s]" or "daily|weekly|monthly|yearly|annually"
export const RECURRENCE = new RegExp(
  `\\b(?:every\\s+(?:(other|\\d{1,2})\\s+)?(weekday|weekend|day|week|month|year|${DAY_NAMES.join("|")})s?|(daily|weekly|monthly|yearly|annually))\\b`,
  "i"
);

/** Reads the first repeat phrase in `text`; null when there is none */
export function parseRecurrence(text: string): Recurrence | null {
  const m = RECURRENCE.exec(text);
  if (!m) return null;
  const [, every, unit, adverb] = m;

  if (adverb) return { frequency: ADVERBS[adverb.toLowerCase()], interval: 1, weekdays: [] };

  const interval = !every ? 1 : every.toLowerCase() === "other" ? 2 : Number(every);
  if (interval < 1) return null;

  const word = unit.toLowerCase();
  if (word === "weekday") return { frequency: "weekly", interval, weekdays: WORKWEEK };
  if (word === "weekend") return { frequency: "weekly", interval, weekdays: WEEKEND };

  const day = DAY_NAMES.findIndex((name) => name.toLowerCase() === word);
  if (day >= 0) return { frequency: "weekly", interval, weekdays: [day] };

  return { frequency: UNITS[word], interval, weekdays: [] };
}

/** RRULE body without the "RRULE:" prefix, as Calendar's `recurrence` property takes it */
export function toRRule(rule: Recurrence): string {
  const parts = [`FREQ=${rule.frequency.toUpperCase()}`];
  if (rule.interval > 1) parts.push(`INTERVAL=${rule.interval}`);
  if (rule.weekdays.length > 0) parts.push(`BYDAY=${rule.weekdays.map((d) => BYDAY[d]).join(",")}`);
  return parts.join(";");
}

function sameDays(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

function dayNames(days: number[]): string {
  return days.map((d) => DAY_NAMES[d]).join(" and ");
}

/** "every Monday", "every other week", "every 3 months" */
export function spellRecurrence(rule: Recurrence): string {
  const every = rule.interval === 1 ? "every" : rule.interval === 2 ? "every other" : `every ${rule.interval}`;

  if (rule.weekdays.length > 0 && rule.interval <= 2) {
    if (sameDays(rule.weekdays, WORKWEEK)) return `${every} weekday`;
    if (sameDays(rule.weekdays, WEEKEND)) return `${every} weekend`;
    return `${every} ${dayNames(rule.weekdays)}`;
  }
  if (rule.weekdays.length > 0) return `every ${rule.interval} weeks on ${dayNames(rule.weekdays)}`;

  const unit = UNIT_WORDS[rule.frequency];
  return rule.interval > 2 ? `${every} ${unit}s` : `${every} ${unit}`;
}
