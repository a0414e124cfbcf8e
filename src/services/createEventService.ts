// src/services/createEventService.ts
// extract -> render -> osascript, with one retry on the rules parser's event
// when the model's event is refused by the calendar app.
import type { Config } from "../config.js";
import { AppError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { CalendarApp, CreateEventOutcome, EventDescriptor } from "../types/events.js";
import { runOsascript, type ScriptResult, type ScriptRunner } from "./automation/osascript.js";
import { extractRules } from "./extractDate/ruleEventExtractor.js";
import { extractSmart } from "./extractDate/smartEventExtractorSelector.js";
import { appName, renderEvent } from "./render/index.js";

export type CreateEventInput = {
  text: string;
  config: Config;
  now?: Date;
  /** Skip the model and use the rules parser only */
  offline?: boolean;
  /** Overrides config.calendarApp for this run */
  app?: CalendarApp;
  runner?: ScriptRunner;
};

export async function createEvent(input: CreateEventInput): Promise<CreateEventOutcome> {
  const { config } = input;
  const now = input.now ?? new Date();
  const app = input.app ?? config.calendarApp;

  const extraction = await extractSmart({
    text: input.text,
    now,
    timezone: config.timezone,
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    model: config.llmModel,
    budgetMs: config.llmTimeoutMs,
    llmFirst: !input.offline,
  });
  const warnings = [...extraction.warnings];

  const first = await dispatch(extraction.event, app, input);
  if (first.exitCode === 0) {
    return { event: extraction.event, app, usedFallback: extraction.event.source === "rules", warnings };
  }

  if (extraction.event.source === "rules") {
    throw automationError(app, first);
  }

  logger.info("retrying with rule-based extraction", { app });
  warnings.push(`${appName(app)} refused the model's event: ${first.stderr.trim()}`);
  const fallback = extractRules({ text: input.text, now });
  warnings.push(...fallback.warnings);

  const second = await dispatch(fallback.event, app, input);
  if (second.exitCode !== 0) {
    throw automationError(app, second);
  }
  return { event: fallback.event, app, usedFallback: true, warnings };
}

function dispatch(event: EventDescriptor, app: CalendarApp, input: CreateEventInput): Promise<ScriptResult> {
  const script = renderEvent(event, app, {
    calendarName: input.config.calendarName,
    defaultDurationMinutes: input.config.defaultDurationMinutes,
  });
  return runOsascript(script, { timeoutMs: input.config.osascriptTimeoutMs, runner: input.runner });
}

function automationError(app: CalendarApp, result: ScriptResult): AppError {
  return new AppError(
    "E_AUTOMATION",
    `Failed to create event in ${appName(app)}`,
    result.stderr.trim() || `osascript exited with ${result.exitCode}`
  );
}
