// src/routes/commands.ts
// Maps the positional words of a CLI call to a command and its text.
const COMMANDS = ["create", "preview", "calendars", "doctor"] as const;
export type Command = (typeof COMMANDS)[number];

// Commands that take a description after the command word
const TAKES_TEXT: readonly Command[] = ["create", "preview"];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * `calendars` and `doctor` only count as commands on their own, so
 * "doctor appointment tomorrow 3pm" creates an event. `create <text>` forces
 * creation for any other text that starts with a command word.
 */
export function resolveCommand(positionals: string[]): { command: Command; text: string } {
  const [head, ...tail] = positionals;
  if (isCommand(head) && (TAKES_TEXT.includes(head) || tail.length === 0)) {
    return { command: head, text: tail.join(" ") };
  }
  return { command: "create", text: positionals.join(" ") };
}
