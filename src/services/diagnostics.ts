// src/services/diagnostics.ts
import type { Config } from "../config.js";
import type { CalendarApp } from "../types/events.js";
import { runOsascript, type ScriptRunner } from "./automation/osascript.js";
import { appName } from "./render/index.js";

export type Diagnosis = {
  healthy: boolean;
  issues: string[];
  apiKeyConfigured: boolean;
  appInstalled: boolean;
};

// `id of application` errors out when the app is not installed, without launching it
const APP_LOOKUP: Record<CalendarApp, string> = {
  calendar: 'id of application "Calendar"',
  fantastical: 'id of application "Fantastical"',
};

export async function diagnose(config: Config, runner?: ScriptRunner): Promise<Diagnosis> {
  const issues: string[] = [];

  const apiKeyConfigured = config.openaiApiKey !== null;
  if (!apiKeyConfigured) {
    issues.push(`No OpenAI API key: set OPENAI_API_KEY or write it to ${config.configDir}/.openai_key`);
  }

  const lookup = await runOsascript(APP_LOOKUP[config.calendarApp], {
    timeoutMs: config.osascriptTimeoutMs,
    runner,
  });
  const appInstalled = lookup.exitCode === 0;
  if (!appInstalled) {
    issues.push(`${appName(config.calendarApp)} is not installed or not scriptable`);
  }

  return { healthy: issues.length === 0, issues, apiKeyConfigured, appInstalled };
}
