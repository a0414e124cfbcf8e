// src/services/render/applescript.ts

/** AppleScript string literal. Newlines fold to spaces; `"` and `\` are escaped. */
export function quote(text: string): string {
  const escaped = text
    .replace(/\r\n|\r|\n/g, " ")
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"');
  return `"${escaped}"`;
}

/**
 * Statements that set `variable` to `date` without going through a date
 * string, whose format depends on the user's locale. Day is set to 1 first so
 * changing the month never overflows (e.g. Jan 31 -> Feb).
 */
export function dateAssignment(variable: string, date: Date): string[] {
  const seconds = date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
  return [
    `set ${variable} to current date`,
    `set day of ${variable} to 1`,
    `set year of ${variable} to ${date.getFullYear()}`,
    `set month of ${variable} to ${date.getMonth() + 1}`,
    `set day of ${variable} to ${date.getDate()}`,
    `set time of ${variable} to ${seconds}`,
  ];
}

export function indent(lines: string[], depth = 1): string[] {
  const pad = "  ".repeat(depth);
  return lines.map((l) => `${pad}${l}`);
}
