import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../clients/openai.js", () => ({
  openaiChatJSON: vi.fn(),
}));

vi.mock("../../lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { openaiChatJSON } from "../../clients/openai.js";
import { AppError, LlmRequestError } from "../../lib/errors.js";
import { buildPrompt, extractJsonBlock, extractLLM, type LlmExtractInput } from "./llmEventExtractor.js";
import { extractSmart } from "./smartEventExtractorSelector.js";

const mockChat = vi.mocked(openaiChatJSON);

// Monday, October 19, 2026, 09:00 local time
const now = new Date(2026, 9, 19, 9, 0);

const input: LlmExtractInput = {
  text: "Lunch with Sarah tomorrow at noon at Factory Girl",
  now,
  timezone: "America/Toronto",
  apiKey: "test-openai-key",
  baseUrl: "https://llm.test/v1",
  model: "test-model",
};

const reply = JSON.stringify({
  title: "Lunch with Sarah",
  start: "2026-10-20T12:00:00",
  end: "2026-10-20T13:00:00",
  all_day: false,
  location: "Factory Girl",
  notes: null,
});

beforeEach(() => {
  vi.clearAllMocks();
});

describe("extractLLM", () => {
  it("validates and normalizes the model's event", async () => {
    mockChat.mockResolvedValueOnce(reply);

    const result = await extractLLM(input);

    expect(result).toEqual({
      event: {
        title: "Lunch with Sarah",
        start: "2026-10-20T12:00:00",
        end: "2026-10-20T13:00:00",
        allDay: false,
        location: "Factory Girl",
        notes: "",
        source: "llm",
      },
      degraded: false,
      warnings: [],
    });
    expect(mockChat).toHaveBeenCalledWith(
      expect.objectContaining({ apiKey: "test-openai-key", baseUrl: "https://llm.test/v1", model: "test-model" })
    );
  });

  it("carries the repeat pattern of recurring events", async () => {
    mockChat.mockResolvedValueOnce(
      JSON.stringify({ title: "Standup", start: "2026-10-26T09:00:00", recurrence: "every weekday" })
    );

    const result = await extractLLM({ ...input, text: "Standup every weekday at 9am" });
    expect(result.event).toMatchObject({
      title: "Standup",
      start: "2026-10-26T09:00:00",
      recurrence: { frequency: "weekly", interval: 1, weekdays: [1, 2, 3, 4, 5] },
    });
  });

  it("accepts replies wrapped in code fences", async () => {
    mockChat.mockResolvedValueOnce("```json\n" + reply + "\n```");

    const result = await extractLLM(input);
    expect(result.event?.title).toBe("Lunch with Sarah");
  });

  it("degrades on a reply that is not JSON", async () => {
    mockChat.mockResolvedValueOnce("Sure! Lunch is tomorrow.");

    await expect(extractLLM(input)).resolves.toEqual({
      event: null,
      degraded: true,
      warnings: ["llm reply is not JSON"],
    });
  });

  it("degrades on JSON missing required fields", async () => {
    mockChat.mockResolvedValueOnce(JSON.stringify({ start: "2026-10-20T12:00:00" }));

    const result = await extractLLM(input);
    expect(result.degraded).toBe(true);
    expect(result.warnings).toEqual(["llm reply failed validation: title: Required"]);
  });

  it("degrades on request errors", async () => {
    mockChat.mockRejectedValueOnce(new LlmRequestError("llm HTTP 503: overloaded", 503));

    const result = await extractLLM(input);
    expect(result).toEqual({ event: null, degraded: true, warnings: ["llm HTTP 503: overloaded"] });
  });

  it("lets key errors through", async () => {
    mockChat.mockRejectedValueOnce(new AppError("E_NO_API_KEY", "OpenAI API key not found"));

    await expect(extractLLM(input)).rejects.toMatchObject({ code: "E_NO_API_KEY" });
  });

  describe("with a slow model", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("aborts after the budget", async () => {
      mockChat.mockImplementationOnce(
        (req) =>
          new Promise<string>((_resolve, reject) => {
            req.signal?.addEventListener("abort", () => {
              reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
            });
          })
      );

      const pending = extractLLM({ ...input, budgetMs: 2000 });
      await vi.advanceTimersByTimeAsync(2000);

      await expect(pending).resolves.toEqual({
        event: null,
        degraded: true,
        warnings: ["llm timeout after 2000ms"],
      });
    });
  });
});

describe("buildPrompt", () => {
  it("anchors relative dates to today", () => {
    const prompt = buildPrompt({ text: 'Dinner "at" 7', now, timezone: "America/Toronto" });
    expect(prompt).toContain("- Today is Monday, October 19, 2026 and the time is 09:00");
    expect(prompt).toContain("- Tomorrow is Tuesday, October 20, 2026");
    expect(prompt).toContain("- Timezone: America/Toronto");
    expect(prompt).toContain('Request: "Dinner \\"at\\" 7"');
    expect(prompt).toContain('"recurrence":"string or null"');
  });
});

describe("extractJsonBlock", () => {
  it("slices the object out of surrounding prose", () => {
    expect(extractJsonBlock('Here you go: {"title":"x"} hope it helps')).toBe('{"title":"x"}');
  });
});

describe("extractSmart", () => {
  it("falls back to the rules parser when the model reply is malformed", async () => {
    mockChat.mockResolvedValueOnce("not json");

    const result = await extractSmart(input);

    expect(result.degraded).toBe(true);
    expect(result.warnings).toEqual(["llm reply is not JSON"]);
    expect(result.event).toMatchObject({
      title: "Lunch with Sarah",
      start: "2026-10-20T12:00:00",
      location: "Factory Girl",
      source: "rules",
    });
  });

  it("returns the model's event when it is valid", async () => {
    mockChat.mockResolvedValueOnce(reply);

    const result = await extractSmart(input);
    expect(result.degraded).toBe(false);
    expect(result.event.source).toBe("llm");
  });

  it("skips the model when llmFirst is false", async () => {
    const result = await extractSmart({ ...input, llmFirst: false });

    expect(mockChat).not.toHaveBeenCalled();
    expect(result.event.source).toBe("rules");
  });
});
