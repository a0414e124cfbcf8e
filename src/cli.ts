#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "node:util";

import { loadConfig } from "./config.js";
import { getCalendars, getDiagnosis, getPreview, postCreateEvent } from "./controller/createEventController.js";
import { AppError, errorMessage } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { sendErr } from "./lib/output.js";
import { resolveCommand } from "./routes/commands.js";
import { CliOptions } from "./schemas/createEvent.schema.js";

const USAGE = `Usage:
  calspeak [create] <event description>   create the event; "create" is needed when
                                          the description starts with "create" or "preview"
  calspeak preview <text>                 print Alfred script-filter JSON
  calspeak calendars                      list Apple Calendar calendars
  calspeak doctor                         check configuration

Options:
  --app calendar|fantastical   override the configured calendar app
  --offline                    skip the language model, parse locally
  -h, --help                   show this help`;

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      app: { type: "string" },
      offline: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

async function main(argv: string[]): Promise<number> {
  let args: ReturnType<typeof readArgs>;
  try {
    args = readArgs(argv);
  } catch (e: unknown) {
    return sendErr("E_BAD_INPUT", errorMessage(e), 2, USAGE);
  }
  const { values, positionals } = args;

  const options = CliOptions.safeParse(values);
  if (!options.success) {
    return sendErr("E_BAD_INPUT", "--app must be 'calendar' or 'fantastical'", 2);
  }
  if (options.data.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const { command, text } = resolveCommand(positionals);

  const config = loadConfig();
  const app = options.data.app ?? config.calendarApp;

  switch (command) {
    case "preview":
      return getPreview(text, app, {});
    case "calendars":
      return getCalendars({ config });
    case "doctor":
      return getDiagnosis({ config: { ...config, calendarApp: app } });
    case "create":
      return postCreateEvent({ text, app: options.data.app, offline: options.data.offline }, { config });
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    if (e instanceof AppError) {
      process.exitCode = sendErr(e.code, e.message, e.exitCode, e.detail);
      return;
    }
    logger.error("unexpected failure", { error: errorMessage(e), stack: e instanceof Error ? e.stack : undefined });
    process.exitCode = sendErr("E_INTERNAL", errorMessage(e), 1);
  });
