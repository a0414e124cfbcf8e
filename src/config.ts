// src/config.ts
// Settings come from the environment (dotenv is loaded by the CLI entry) and
// from one-line files in the config directory:
//   .openai_key     API key
//   .calendar_app   "calendar" | "fantastical"
//   .calendar_name  target calendar
import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { AppError } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import type { CalendarApp } from "./types/events.js";

export const CONFIG_FILES = {
  apiKey: ".openai_key",
  calendarApp: ".calendar_app",
  calendarName: ".calendar_name",
} as const;

export interface Config {
  configDir: string;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  llmModel: string;
  llmTimeoutMs: number;
  calendarApp: CalendarApp;
  calendarName: string | null;
  defaultDurationMinutes: number;
  osascriptTimeoutMs: number;
  timezone: string;
}

type Env = Record<string, string | undefined>;

const CalendarAppSchema = z.enum(["calendar", "fantastical"]);

const TunablesSchema = z.object({
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(15000),
  OSASCRIPT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(10000),
  DEFAULT_DURATION_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(60),
});

export function resolveConfigDir(env: Env = process.env): string {
  return env.CALSPEAK_CONFIG_DIR || env.alfred_workflow_data || join(homedir(), ".config", "calspeak");
}

function readOptionalFile(path: string): string | null {
  try {
    const value = readFileSync(path, "utf8").trim();
    return value || null;
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function parseCalendarApp(raw: string | null): CalendarApp {
  if (!raw) return "calendar";
  const parsed = CalendarAppSchema.safeParse(raw.toLowerCase());
  if (parsed.success) return parsed.data;
  logger.warn("unknown calendar app preference, using Apple Calendar", { value: raw });
  return "calendar";
}

export function loadConfig(env: Env = process.env): Config {
  const configDir = resolveConfigDir(env);
  const fromFile = (name: string) => readOptionalFile(join(configDir, name));

  // Empty strings in .env mean "unset"
  const tunables = TunablesSchema.safeParse(
    Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""))
  );
  if (!tunables.success) {
    const detail = tunables.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new AppError("E_CONFIG", "Invalid configuration", detail);
  }

  return {
    configDir,
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY) ?? fromFile(CONFIG_FILES.apiKey),
    openaiBaseUrl: tunables.data.OPENAI_BASE_URL.replace(/\/+$/, ""),
    llmModel: tunables.data.LLM_MODEL,
    llmTimeoutMs: tunables.data.LLM_TIMEOUT_MS,
    calendarApp: parseCalendarApp(nonEmpty(env.CALSPEAK_APP) ?? fromFile(CONFIG_FILES.calendarApp)),
    calendarName: nonEmpty(env.CALSPEAK_CALENDAR) ?? fromFile(CONFIG_FILES.calendarName),
    defaultDurationMinutes: tunables.data.DEFAULT_DURATION_MINUTES,
    osascriptTimeoutMs: tunables.data.OSASCRIPT_TIMEOUT_MS,
    timezone: nonEmpty(env.TZ) ?? Intl.DateTimeFormat().resolvedOptions().timeZone,
  };
}
