// src/services/automation/osascript.ts
import { execFile } from "node:child_process";
import { logger } from "../../lib/logger.js";

export type ScriptResult = { exitCode: number; stdout: string; stderr: string };

/** Runs one AppleScript source. Resolves for failing scripts too; only the exit code tells. */
export type ScriptRunner = (script: string, timeoutMs: number) => Promise<ScriptResult>;

export const osascriptRunner: ScriptRunner = (script, timeoutMs) =>
  new Promise((resolve) => {
    execFile("osascript", ["-e", script], { timeout: timeoutMs }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      // Spawn failures (ENOENT off macOS) and timeouts carry no numeric code
      const exitCode = typeof error.code === "number" ? error.code : 1;
      resolve({ exitCode, stdout, stderr: stderr.trim() || error.message });
    });
  });

export async function runOsascript(
  script: string,
  options: { timeoutMs: number; runner?: ScriptRunner }
): Promise<ScriptResult> {
  const runner = options.runner ?? osascriptRunner;
  logger.debug("running osascript", { script });
  const result = await runner(script, options.timeoutMs);
  if (result.exitCode !== 0) {
    logger.warn("osascript failed", { exitCode: result.exitCode, stderr: result.stderr.trim() });
  }
  return result;
}

/** AppleScript lists print as "a, b, c" */
export function parseAppleScriptList(output: string): string[] {
  const trimmed = output.trim();
  if (!trimmed || trimmed === "missing value") return [];
  return trimmed.split(", ").map((s) => s.trim()).filter(Boolean);
}
