// src/lib/output.ts
// CLI counterpart of an HTTP ok/err envelope: stdout gets the user-facing line,
// the return value is the process exit code.
import { logger } from "./logger.js";
import type { ErrorCode } from "./errors.js";

export type Writer = (line: string) => void;

const stdoutWriter: Writer = (line) => {
  process.stdout.write(`${line}\n`);
};

export function sendOk(message: string, meta?: Record<string, unknown>, write: Writer = stdoutWriter): number {
  if (meta) logger.debug("command succeeded", meta);
  write(message);
  return 0;
}

export function sendErr(
  code: ErrorCode,
  message: string,
  exitCode: number,
  detail?: string,
  write: Writer = stdoutWriter
): number {
  logger.error(message, { code, detail });
  write(`Error: ${message}`);
  return exitCode;
}
