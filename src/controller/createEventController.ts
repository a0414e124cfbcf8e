// controller/createEventController.ts
import { format } from "date-fns";
import type { Config } from "../config.js";
import { CreateEventBody } from "../schemas/createEvent.schema.js";
import { AppError, errorMessage } from "../lib/errors.js";
import { sendErr, sendOk, type Writer } from "../lib/output.js";
import type { ScriptRunner } from "../services/automation/osascript.js";
import { listCalendars } from "../services/calendars.js";
import { createEvent } from "../services/createEventService.js";
import { diagnose } from "../services/diagnostics.js";
import { startDate } from "../services/eventDescriptor.js";
import { spellRecurrence } from "../services/recurrence.js";
import { spellTime } from "../services/render/fantastical.js";
import { appName } from "../services/render/index.js";
import { buildScriptFilterItems } from "../services/scriptFilter.js";
import type { CalendarApp, CreateEventOutcome } from "../types/events.js";

export type CommandDeps = {
  config: Config;
  runner?: ScriptRunner;
  now?: Date;
  write?: Writer;
};

// create
export async function postCreateEvent(body: unknown, deps: CommandDeps): Promise<number> {
  const parsed = CreateEventBody.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => i.message).join("; ");
    return sendErr("E_BAD_INPUT", detail || "Invalid event description", 2, undefined, deps.write);
  }

  try {
    const outcome = await createEvent({
      text: parsed.data.text,
      config: deps.config,
      now: deps.now,
      offline: parsed.data.offline,
      app: parsed.data.app,
      runner: deps.runner,
    });
    return sendOk(describeOutcome(outcome), { event: outcome.event, warnings: outcome.warnings }, deps.write);
  } catch (e: unknown) {
    return sendFailure(e, deps.write);
  }
}

// preview (Alfred script filter)
export function getPreview(query: string, app: CalendarApp, deps: Pick<CommandDeps, "write">): number {
  return sendOk(JSON.stringify(buildScriptFilterItems(query, app)), undefined, deps.write);
}

// calendars
export async function getCalendars(deps: CommandDeps): Promise<number> {
  try {
    const names = await listCalendars({ timeoutMs: deps.config.osascriptTimeoutMs, runner: deps.runner });
    return sendOk(names.join("\n"), { count: names.length }, deps.write);
  } catch (e: unknown) {
    return sendFailure(e, deps.write);
  }
}

// doctor
export async function getDiagnosis(deps: CommandDeps): Promise<number> {
  const report = await diagnose(deps.config, deps.runner);
  const lines = [
    `Calendar app: ${appName(deps.config.calendarApp)}${report.appInstalled ? "" : " (not found)"}`,
    `Target calendar: ${deps.config.calendarName ?? "(default)"}`,
    `API key: ${report.apiKeyConfigured ? "configured" : "missing"}`,
    `Model: ${deps.config.llmModel}`,
    ...report.issues.map((issue) => `! ${issue}`),
  ];
  if (report.healthy) return sendOk(lines.join("\n"), undefined, deps.write);
  return sendErr("E_CONFIG", lines.join("\n"), 5, report.issues.join("; "), deps.write);
}

export function describeOutcome(outcome: CreateEventOutcome): string {
  const { event } = outcome;
  const start = startDate(event);
  const day = format(start, "EEE, MMM d");
  const when = event.allDay ? day : `${day} at ${spellTime(start)}`;
  const repeat = event.recurrence ? `, repeating ${spellRecurrence(event.recurrence)},` : "";
  const suffix = outcome.usedFallback ? " (parsed offline)" : "";
  return `Created "${event.title}" on ${when}${repeat} in ${appName(outcome.app)}${suffix}`;
}

function sendFailure(e: unknown, write?: Writer): number {
  if (e instanceof AppError) {
    return sendErr(e.code, e.detail ? `${e.message}: ${e.detail}` : e.message, e.exitCode, e.detail, write);
  }
  return sendErr("E_INTERNAL", errorMessage(e) || "Event creation failed", 1, undefined, write);
}
