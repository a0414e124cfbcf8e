import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("./lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { loadConfig, parseCalendarApp, resolveConfigDir } from "./config.js";
import { AppError } from "./lib/errors.js";
import { logger } from "./lib/logger.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "calspeak-config-"));
  vi.clearAllMocks();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("resolveConfigDir", () => {
  it("prefers CALSPEAK_CONFIG_DIR, then Alfred's workflow data folder", () => {
    expect(resolveConfigDir({ CALSPEAK_CONFIG_DIR: "/a", alfred_workflow_data: "/b" })).toBe("/a");
    expect(resolveConfigDir({ alfred_workflow_data: "/b" })).toBe("/b");
    expect(resolveConfigDir({})).toBe(join(homedir(), ".config", "calspeak"));
  });
});

describe("loadConfig", () => {
  it("uses defaults when nothing is configured", () => {
    const config = loadConfig({ CALSPEAK_CONFIG_DIR: dir, TZ: "America/Toronto" });

    expect(config).toEqual({
      configDir: dir,
      openaiApiKey: null,
      openaiBaseUrl: "https://api.openai.com/v1",
      llmModel: "gpt-4o-mini",
      llmTimeoutMs: 15000,
      calendarApp: "calendar",
      calendarName: null,
      defaultDurationMinutes: 60,
      osascriptTimeoutMs: 10000,
      timezone: "America/Toronto",
    });
  });

  it("reads the one-line files in the config directory", () => {
    writeFileSync(join(dir, ".openai_key"), "test-secret\n");
    writeFileSync(join(dir, ".calendar_app"), "Fantastical\n");
    writeFileSync(join(dir, ".calendar_name"), " Work \n");

    const config = loadConfig({ CALSPEAK_CONFIG_DIR: dir });

    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.calendarApp).toBe("fantastical");
    expect(config.calendarName).toBe("Work");
  });

  it("lets the environment override the files", () => {
    writeFileSync(join(dir, ".openai_key"), "test-secret");
    writeFileSync(join(dir, ".calendar_app"), "fantastical");

    const config = loadConfig({
      CALSPEAK_CONFIG_DIR: dir,
      OPENAI_API_KEY: "test-env-key",
      CALSPEAK_APP: "calendar",
      CALSPEAK_CALENDAR: "Family",
      OPENAI_BASE_URL: "http://localhost:1234/v1/",
      LLM_TIMEOUT_MS: "5000",
    });

    expect(config).toMatchObject({
      openaiApiKey: "test-env-key",
      calendarApp: "calendar",
      calendarName: "Family",
      openaiBaseUrl: "http://localhost:1234/v1",
      llmTimeoutMs: 5000,
    });
  });

  it("treats empty variables as unset", () => {
    writeFileSync(join(dir, ".openai_key"), "test-secret");

    const config = loadConfig({ CALSPEAK_CONFIG_DIR: dir, OPENAI_API_KEY: "", LLM_MODEL: "" });

    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.llmModel).toBe("gpt-4o-mini");
  });

  it("rejects invalid tunables", () => {
    let error: unknown;
    try {
      loadConfig({ CALSPEAK_CONFIG_DIR: dir, LLM_TIMEOUT_MS: "soon" });
    } catch (e: unknown) {
      error = e;
    }
    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: "E_CONFIG", message: "Invalid configuration" });
  });
});

describe("parseCalendarApp", () => {
  it("falls back to Apple Calendar for unknown apps", () => {
    expect(parseCalendarApp("Outlook")).toBe("calendar");
    expect(logger.warn).toHaveBeenCalledWith("unknown calendar app preference, using Apple Calendar", {
      value: "Outlook",
    });
  });

  it("defaults to Apple Calendar", () => {
    expect(parseCalendarApp(null)).toBe("calendar");
  });
});
