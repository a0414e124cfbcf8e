// src/clients/openai.ts
// Minimal OpenAI-compatible chat-completions client. Any server exposing
// POST {baseUrl}/chat/completions works (set OPENAI_BASE_URL).
import { z } from "zod";
import { AppError, LlmRequestError } from "../lib/errors.js";

const ChatCompletion = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export type ChatJSONRequest = {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  system: string;
  prompt: string;
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
};

/** Returns the raw text of the first choice; the caller parses and validates it */
export async function openaiChatJSON(req: ChatJSONRequest): Promise<string> {
  if (!req.apiKey) {
    throw new AppError(
      "E_NO_API_KEY",
      "OpenAI API key not found",
      "Set OPENAI_API_KEY or write the key to .openai_key in the config directory"
    );
  }

  const resp = await fetch(`${req.baseUrl}/chat/completions`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${req.apiKey}`,
    },
    body: JSON.stringify({
      model: req.model,
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.prompt },
      ],
      response_format: { type: "json_object" },
      temperature: req.temperature ?? 0.1,
      max_tokens: req.maxTokens ?? 300,
    }),
    signal: req.signal,
  });

  if (resp.status === 401 || resp.status === 403) {
    const text = await resp.text().catch(() => "");
    throw new AppError("E_INVALID_API_KEY", "OpenAI rejected the API key", `HTTP ${resp.status}: ${text}`);
  }

  if (!resp.ok) {
    const text = await resp.text().catch(() => "");
    const reason = resp.status === 429 ? "rate limit reached" : `HTTP ${resp.status}`;
    throw new LlmRequestError(`llm ${reason}: ${text.slice(0, 200)}`, resp.status);
  }

  const parsed = ChatCompletion.safeParse(await resp.json());
  if (!parsed.success) {
    throw new LlmRequestError("llm response is not a chat completion");
  }

  return parsed.data.choices[0].message.content ?? "";
}
