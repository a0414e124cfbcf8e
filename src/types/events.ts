//  EventDescriptor: the one event an invocation creates
// -----------------------------
// - Built once per run from the model's JSON (or the heuristic parser) and
//   consumed once to render an automation script.
// - `start`/`end` are local wall-clock ISO strings without zone:
//   "2026-10-20T12:00:00" for timed events, "2026-10-20" for all-day ones.
// - allDay implies start/end are calendar dates without time of day.
// =============================
export type EventDescriptor = {
    /** Short human-readable title, becomes the calendar summary */
    title: string;

    /** Required start, "YYYY-MM-DD" when allDay, else "YYYY-MM-DDTHH:mm:ss" */
    start: string;

    /** Optional end in the same shape as start. Never before start. Inclusive last day for all-day events */
    end?: string;

    /** Whole calendar days, no time component */
    allDay: boolean;

    location?: string;

    /** Repeat rule for recurring events ("every Monday", "monthly") */
    recurrence?: Recurrence;

    /** Free-form notes, "" when there are none */
    notes: string;

    /** Which extractor produced this event: the language model or the local heuristic rules */
    source: EventSource;
};

export type EventSource = "rules" | "llm";

export type RecurrenceFrequency = "daily" | "weekly" | "monthly" | "yearly";

export type Recurrence = {
    frequency: RecurrenceFrequency;

    /** Repeats every `interval` periods; "every other week" is 2 */
    interval: number;

    /** Days of the week for weekly rules, 0 = Sunday. Empty: the start's weekday */
    weekdays: number[];
};

export type CalendarApp = "calendar" | "fantastical";


//  ExtractionResult: envelope around one extraction attempt
// -----------------------------
// - `event` is null only when the model path failed (degraded).
// - `degraded`: true if the fallback path produced (or must produce) the event.
// - `warnings`: non-fatal issues, e.g. "llm timeout after 15000ms".
// =============================
export type ExtractionResult = {
    event: EventDescriptor | null;

    /** True if the model could not be used and the heuristic parser has to step in */
    degraded: boolean;

    warnings: string[];
};

/** A successful extraction always carries an event */
export type ResolvedExtraction = ExtractionResult & { event: EventDescriptor };

export type CreateEventOutcome = {
    event: EventDescriptor;
    app: CalendarApp;

    /** True when the heuristic parser's event is the one that was created */
    usedFallback: boolean;

    warnings: string[];
};
