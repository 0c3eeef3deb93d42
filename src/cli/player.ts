#!/usr/bin/env node

import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { runAgentCommand } from "./commands/agent.js";
import { runTuiCommand } from "./commands/tui.js";

type ModeRunner = (args: readonly string[]) => number | Promise<number>;

export const USAGE = `vnscript-player <mode> [options]

modes:
  tui    (--example <id> | --project <dir>) [--state-file <path>]
  agent  list
  agent  start (--example <id> | --project <dir>) --state-out <path>
  agent  choose --state-in <path> --choice <index> --state-out <path>
  agent  input --state-in <path> --text <text> --state-out <path>
`;

const MODES: Record<string, ModeRunner> = {
  agent: (args) => runAgentCommand(args),
  tui: runTuiCommand,
};

const HELP_FLAGS = new Set(["--help", "-h"]);

export const runPlayerCli = async (argv: readonly string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (mode === undefined || HELP_FLAGS.has(mode)) {
    process.stdout.write(USAGE);
    return 0;
  }
  const run = Object.hasOwn(MODES, mode) ? MODES[mode] : undefined;
  if (!run) {
    process.stderr.write(`Unknown mode: ${mode}\n\n${USAGE}`);
    return 1;
  }
  return run(rest);
};

const isEntryModule = (): boolean => {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return fs.realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
};

/* v8 ignore next 10 */
if (isEntryModule()) {
  runPlayerCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : "Unknown CLI crash."}\n`);
      process.exitCode = 1;
    }
  );
}
