// src/lib/errors.ts

export type ErrorCode =
  | "E_BAD_INPUT"
  | "E_NO_API_KEY"
  | "E_INVALID_API_KEY"
  | "E_AUTOMATION"
  | "E_CONFIG"
  | "E_INTERNAL";

const EXIT_CODES: Record<ErrorCode, number> = {
  E_BAD_INPUT: 2,
  E_NO_API_KEY: 3,
  E_INVALID_API_KEY: 3,
  E_AUTOMATION: 4,
  E_CONFIG: 5,
  E_INTERNAL: 1,
};

/**
 * Fatal, user-facing failure. Reaches the CLI boundary and becomes
 * `Error: <message>` plus a non-zero exit code.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly detail?: string;

  constructor(code: ErrorCode, message: string, detail?: string) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.detail = detail;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/** The model endpoint could not be used (network, HTTP status, unexpected body). Triggers fallback. */
export class LlmRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "LlmRequestError";
    this.status = status;
  }
}

/** A candidate event does not fit the descriptor schema. Triggers fallback. */
export class MalformedEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedEventError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
