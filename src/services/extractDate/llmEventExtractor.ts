// Takes the user's text and gives it to the LLM
// =============================
// services/extractDate/llmEventExtractor.ts
// -----------------------------
// LLM-based extractor using an OpenAI-compatible endpoint.
// - Crafts a strict prompt with today's date as context
// - Validates JSON with Zod
// - Sanitizes + enforces invariants (normalizeEvent)
// - Supports timeout via AbortController
// =============================

import { addDays, format } from "date-fns";
import { z } from "zod";
import type { EventDescriptor, ExtractionResult } from "../../types/events.js";
import { openaiChatJSON } from "../../clients/openai.js";
import { AppError, errorMessage } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { normalizeEvent } from "../eventDescriptor.js";

// -------- JSON schema guard (Zod) --------
const LlmEvent = z.object({
  title: z.string().min(1),
  start: z.string().min(1),          // "YYYY-MM-DD" or "YYYY-MM-DDTHH:mm:ss"
  end: z.string().nullish(),
  all_day: z.boolean().default(false),
  location: z.string().nullish(),
  notes: z.string().nullish(),
  recurrence: z.string().nullish(),   // "every Monday", "monthly"
});

const SYSTEM_PROMPT =
  "You extract calendar events from short natural-language requests. You reply with a single JSON object and nothing else.";

export type LlmExtractInput = {
  text: string;
  now: Date;
  timezone: string;
  apiKey: string | null;
  baseUrl: string;
  model: string;
  budgetMs?: number;          // timeout budget
};

// -------- Public API --------
export async function extractLLM(input: LlmExtractInput): Promise<ExtractionResult> {
  const raw = input.text.trim();
  if (!raw) return { event: null, degraded: true, warnings: ["empty text"] };

  const controller = new AbortController();
  const timeoutMs = clampPositive(input.budgetMs ?? 15000, 1000, 120000);
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const prompt = buildPrompt({ text: raw, now: input.now, timezone: input.timezone });

    const respText = await openaiChatJSON({
      apiKey: input.apiKey,
      baseUrl: input.baseUrl,
      model: input.model,
      system: SYSTEM_PROMPT,
      prompt,
      signal: controller.signal,
    });

    const event = parseLlmEvent(respText);
    logger.debug("llm extraction succeeded", { event });
    return { event, degraded: false, warnings: [] };
  } catch (e: unknown) {
    // Key problems are fatal; the rules parser cannot fix them
    if (e instanceof AppError) throw e;

    // Anything else (timeout, HTTP error, bad JSON, schema mismatch)
    // degrades; the caller falls back to rules.
    const reason =
      e instanceof Error && e.name === "AbortError" ? `llm timeout after ${timeoutMs}ms` : errorMessage(e);
    logger.warn("llm extraction failed", { reason });
    return { event: null, degraded: true, warnings: [reason] };
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Validates a model reply and turns it into an EventDescriptor.
 * Throws on anything that is not the expected field set.
 */
export function parseLlmEvent(respText: string): EventDescriptor {
  const jsonStr = extractJsonBlock(respText);
  let data: unknown;
  try {
    data = JSON.parse(jsonStr);
  } catch {
    throw new Error("llm reply is not JSON");
  }

  const parsed = LlmEvent.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`llm reply failed validation: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return normalizeEvent(
    {
      title: e.title,
      start: e.start,
      end: e.end,
      allDay: e.all_day,
      location: e.location,
      notes: e.notes,
      recurrence: e.recurrence,
    },
    "llm"
  );
}

// -------- Helpers --------

export function buildPrompt(args: { text: string; now: Date; timezone: string }) {
  const { text, now, timezone } = args;
  const tomorrow = addDays(now, 1);
  return `
Extract one calendar event from the request below.
Output ONLY a JSON object with exactly these keys:
{"title":"string","start":"string","end":"string or null","all_day":boolean,"location":"string or null","notes":"string or null","recurrence":"string or null"}

Rules:
- Timed events: "start" and "end" are local times "YYYY-MM-DDTHH:mm:ss" with no timezone suffix.
- All-day events and date ranges ("24-30 August", "on Friday" with no time): set "all_day": true and use dates "YYYY-MM-DD"; "end" is the LAST day of the range, inclusive.
- Resolve relative dates ("tomorrow", "next Tuesday") against the current date below.
- If no end time is given, set "end" to null.
- "title" is short and keeps the people involved ("Lunch with Sarah"), without date, time or location words.
- Put the place in "location", anything else worth keeping in "notes".
- Recurring events: keep the repeat pattern in "recurrence" using phrases like "every Monday", "every weekday", "every other week", "daily", "weekly", "monthly", "yearly"; "start" is the first occurrence. Otherwise null. Never put the pattern in the title.
- Do NOT include any explanations or code fences.

Context:
- Today is ${format(now, "EEEE, MMMM d, yyyy")} and the time is ${format(now, "HH:mm")}
- Tomorrow is ${format(tomorrow, "EEEE, MMMM d, yyyy")}
- Timezone: ${timezone}

Request: ${JSON.stringify(text)}
`.trim();
}

function clampPositive(n: number, min: number, max: number) {
  return Math.max(min, Math.min(n, max));
}

/** Extract a JSON object from a response that might include prose or code fences. */
export function extractJsonBlock(s: string): string {
  // Fast path: already pure JSON
  const trimmed = s.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) return trimmed;

  // Remove code fences if present
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch) return fenceMatch[1].trim();

  // Last resort: try to slice the first {...} block
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first) return trimmed.slice(first, last + 1).trim();

  // Give up
  return trimmed;
}
