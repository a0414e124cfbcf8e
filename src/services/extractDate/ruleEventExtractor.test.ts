import { describe, it, expect } from "vitest";
import { extractRules, splitTitleAndLocation } from "./ruleEventExtractor.js";

// Monday, October 19, 2026, 09:00 local time
const now = new Date(2026, 9, 19, 9, 0);

function rules(text: string) {
  return extractRules({ text, now }).event;
}

describe("extractRules", () => {
  it("resolves 'tomorrow at noon' to tomorrow 12:00", () => {
    expect(rules("Lunch with Sarah tomorrow at noon")).toEqual({
      title: "Lunch with Sarah",
      start: "2026-10-20T12:00:00",
      end: undefined,
      allDay: false,
      location: undefined,
      notes: "",
      source: "rules",
    });
  });

  it("classifies a day range as an all-day event, rolling past dates into next year", () => {
    const event = rules("Conference 24-30 August");
    expect(event.allDay).toBe(true);
    expect(event.start).toBe("2027-08-24");
    expect(event.end).toBe("2027-08-30");
    expect(event.title).toBe("Conference");
  });

  it("reads month-first ranges with an explicit year", () => {
    const event = rules("Vacation August 24-30, 2027");
    expect(event).toMatchObject({ title: "Vacation", start: "2027-08-24", end: "2027-08-30", allDay: true });
  });

  it("reads ranges that cross a month and a year", () => {
    const event = rules("Trip 28 December - 3 January");
    expect(event).toMatchObject({ title: "Trip", start: "2026-12-28", end: "2027-01-03", allDay: true });
  });

  it("takes the next occurrence of a weekday and a trailing capitalized location", () => {
    const event = rules("Team meeting Monday at 2pm at Conference Room A");
    expect(event.title).toBe("Team meeting");
    expect(event.start).toBe("2026-10-26T14:00:00");
    expect(event.location).toBe("Conference Room A");
  });

  it("reads an explicit time range on an ISO date", () => {
    const event = rules("Dentist from 9:30am to 11am on 2026-11-03");
    expect(event).toMatchObject({
      title: "Dentist",
      start: "2026-11-03T09:30:00",
      end: "2026-11-03T11:00:00",
      allDay: false,
    });
  });

  it("lets a range start inherit the end's meridiem unless it would come after the end", () => {
    const event = rules("Standup 11-1pm friday");
    expect(event.start).toBe("2026-10-23T11:00:00");
    expect(event.end).toBe("2026-10-23T13:00:00");
  });

  it("applies a duration to a single start time", () => {
    const event = rules("Review at 3pm on November 4th for 90 minutes");
    expect(event).toMatchObject({ title: "Review", start: "2026-11-04T15:00:00", end: "2026-11-04T16:30:00" });
  });

  it("understands 'for half an hour'", () => {
    const event = rules("Sync tomorrow at 10am for half an hour");
    expect(event.start).toBe("2026-10-20T10:00:00");
    expect(event.end).toBe("2026-10-20T10:30:00");
  });

  it("reads 24-hour times", () => {
    expect(rules("Standup 2026-10-21 at 09:15").start).toBe("2026-10-21T09:15:00");
  });

  it("uses part-of-day hours when no time is given", () => {
    expect(rules("Dinner tonight")).toMatchObject({ title: "Dinner", start: "2026-10-19T20:00:00" });
    expect(rules("Gym tomorrow morning")).toMatchObject({ title: "Gym", start: "2026-10-20T09:00:00" });
  });

  it("keeps 'night' in titles unless it reads 'at night'", () => {
    const event = rules("Game night Friday at 7pm");
    expect(event.title).toBe("Game night");
    expect(event.start).toBe("2026-10-23T19:00:00");
  });

  it("makes a date without a time all-day", () => {
    expect(rules("Launch on March 5")).toMatchObject({ title: "Launch", start: "2027-03-05", allDay: true });
    expect(rules("Holiday on 25 December")).toMatchObject({ title: "Holiday", start: "2026-12-25", allDay: true });
  });

  it("falls back to an all-day event today with a warning when nothing is found", () => {
    const result = extractRules({ text: "Call mom", now });
    expect(result.event).toMatchObject({ title: "Call mom", start: "2026-10-19", allDay: true });
    expect(result.warnings).toEqual(["no date or time found; created an all-day event today"]);
  });

  it("uses a placeholder title when only a date is given", () => {
    expect(rules("tomorrow at 5pm").title).toBe("New Event");
  });

  it("reads month-first ranges across two months", () => {
    expect(rules("Team offsite August 24 - September 2")).toMatchObject({
      title: "Team offsite",
      start: "2027-08-24",
      end: "2027-09-02",
      allDay: true,
    });
  });

  it("gives a trailing year to the end of a range over new year", () => {
    expect(rules("Winter break December 20 - January 4, 2027")).toMatchObject({
      title: "Winter break",
      start: "2026-12-20",
      end: "2027-01-04",
    });
  });

  it("lets a range end switch meridiem rather than run past midnight", () => {
    const event = rules("Lunch 11am-1 tomorrow");
    expect(event).toMatchObject({ title: "Lunch", start: "2026-10-20T11:00:00", end: "2026-10-20T13:00:00" });
  });

  it("still rolls an evening range past midnight", () => {
    const event = rules("Party 9pm-1 friday");
    expect(event.start).toBe("2026-10-23T21:00:00");
    expect(event.end).toBe("2026-10-24T01:00:00");
  });

  it("does not read clock times or fractions as dates", () => {
    expect(rules("Call with May 12:30 tomorrow")).toMatchObject({
      title: "Call with May",
      start: "2026-10-20T12:30:00",
      allDay: false,
    });
    expect(rules("Read 1/2 of the book tomorrow at 3pm")).toMatchObject({
      title: "Read 1/2 of the book",
      start: "2026-10-20T15:00:00",
    });
  });

  it("reads a bare hour against the part of day", () => {
    expect(rules("Yoga tomorrow at 7 in the evening")).toMatchObject({ title: "Yoga", start: "2026-10-20T19:00:00" });
    expect(rules("Dinner tonight at 8")).toMatchObject({ title: "Dinner", start: "2026-10-19T20:00:00" });
    expect(rules("Run tomorrow morning at 6:30")).toMatchObject({ title: "Run", start: "2026-10-20T06:30:00" });
  });

  it("keeps unused time and duration phrases out of the title", () => {
    expect(rules("Conference 24-30 August at 9am")).toMatchObject({ title: "Conference", start: "2027-08-24", allDay: true });
    expect(rules("Meeting tomorrow for 2 hours")).toMatchObject({ title: "Meeting", start: "2026-10-20", allDay: true });
  });
});

describe("extractRules recurrence", () => {
  it("starts 'every Monday' on the next Monday and keeps the rule", () => {
    const result = extractRules({ text: "Standup every Monday at 9am", now });
    expect(result.event).toMatchObject({
      title: "Standup",
      start: "2026-10-26T09:00:00",
      recurrence: { frequency: "weekly", interval: 1, weekdays: [1] },
    });
    expect(result.warnings).toEqual([]);
  });

  it("reads adverbs and 'every other'", () => {
    expect(rules("Standup daily at 9am")).toMatchObject({
      title: "Standup",
      start: "2026-10-19T09:00:00",
      recurrence: { frequency: "daily", interval: 1, weekdays: [] },
    });
    expect(rules("Payroll every other week on Friday")).toMatchObject({
      title: "Payroll",
      start: "2026-10-23",
      recurrence: { frequency: "weekly", interval: 2, weekdays: [] },
    });
  });

  it("keeps a leading adverb in the title", () => {
    expect(rules("Weekly review Friday at 3pm")).toMatchObject({
      title: "Weekly review",
      start: "2026-10-23T15:00:00",
      recurrence: { frequency: "weekly", interval: 1, weekdays: [] },
    });
  });

  it("leaves one-off events without a rule", () => {
    expect(rules("Lunch with Sarah tomorrow at noon").recurrence).toBeUndefined();
  });
});

describe("splitTitleAndLocation", () => {
  it("splits a trailing 'at <Place>'", () => {
    expect(splitTitleAndLocation("Coffee with Sarah at Starbucks")).toEqual({
      title: "Coffee with Sarah",
      location: "Starbucks",
    });
  });

  it("leaves lowercase places in the title", () => {
    expect(splitTitleAndLocation("Dinner at home")).toEqual({ title: "Dinner at home" });
  });

  it("strips dangling connectors", () => {
    expect(splitTitleAndLocation("  Lunch with Anna on ")).toEqual({ title: "Lunch with Anna" });
  });
});
