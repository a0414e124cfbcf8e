// src/services/calendars.ts
import { AppError } from "../lib/errors.js";
import { parseAppleScriptList, runOsascript, type ScriptRunner } from "./automation/osascript.js";

const LIST_CALENDARS = 'tell application "Calendar" to get name of every calendar whose writable is true';

/** Names of the writable Apple Calendar calendars, for `.calendar_name` */
export async function listCalendars(options: { timeoutMs: number; runner?: ScriptRunner }): Promise<string[]> {
  const result = await runOsascript(LIST_CALENDARS, options);
  if (result.exitCode !== 0) {
    throw new AppError("E_AUTOMATION", "Could not read calendars from Apple Calendar", result.stderr.trim());
  }
  return parseAppleScriptList(result.stdout);
}
