import { VnScriptError } from "../../core/errors.js";
import type { VnRuntime } from "../../runtime/interpreter.js";
import {
  chooseAndContinue,
  resumeProject,
  startProject,
  submitInputAndContinue,
  type BoundaryResult,
} from "../core/engine-runner.js";
import { FlagSet } from "../core/flags.js";
import {
  listExampleProjects,
  loadProjectFromDir,
  loadProjectSource,
  resolveProjectSource,
  type LoadedProject,
} from "../core/project-loader.js";
import { createPlayerState, loadPlayerState, savePlayerState } from "../core/state-store.js";

export type LineWriter = (line: string) => void;

type Subcommand = (flags: FlagSet) => string[];

interface Session {
  project: LoadedProject;
  runtime: VnRuntime;
}

const SUBCOMMAND_HINT = "Use list/start/choose/input.";

const json = (value: string): string => JSON.stringify(value);

/** Protocol lines for one boundary; `stateOut` is null once the story has ended. */
export const boundaryLines = (boundary: BoundaryResult, stateOut: string | null): string[] => {
  const lines = ["RESULT:OK", `EVENT:${boundary.event}`];
  for (const text of boundary.texts) {
    lines.push(`TEXT_JSON:${json(text)}`);
  }
  const prompt = boundary.event === "INPUT" ? boundary.inputPromptText : boundary.choicePromptText;
  if (boundary.event !== "END" && prompt !== null) {
    lines.push(`PROMPT_JSON:${json(prompt)}`);
  }
  for (const choice of boundary.choices) {
    lines.push(`CHOICE:${choice.index}|${json(choice.text)}`);
  }
  if (boundary.event === "INPUT" && boundary.inputDefaultText !== null) {
    lines.push(`INPUT_DEFAULT_JSON:${json(boundary.inputDefaultText)}`);
  }
  lines.push(`STATE_OUT:${stateOut ?? "NONE"}`);
  return lines;
};

export const errorLines = (error: unknown): string[] => {
  const code = error instanceof VnScriptError ? error.code : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  return ["RESULT:ERROR", `ERROR_CODE:${code}`, `ERROR_MSG_JSON:${json(message)}`];
};

/** Writes player state only while the story still waits on the player. */
const settle = (session: Session, boundary: BoundaryResult, stateOut: string): string[] => {
  if (boundary.event === "END") {
    return boundaryLines(boundary, null);
  }
  savePlayerState(stateOut, createPlayerState(session.project.id, session.runtime.snapshot()));
  return boundaryLines(boundary, stateOut);
};

const resume = (flags: FlagSet): Session => {
  const state = loadPlayerState(flags.require("state-in"));
  const project = loadProjectFromDir(state.projectId);
  return { project, runtime: resumeProject(project, state.save).runtime };
};

const parseChoiceIndex = (raw: string): number => {
  const index = Number.parseInt(raw, 10);
  if (Number.isNaN(index)) {
    throw new VnScriptError("CLI_CHOICE_PARSE", `Invalid choice index: ${raw}`);
  }
  return index;
};

const SUBCOMMANDS = new Map<string, Subcommand>([
  [
    "list",
    () => ["RESULT:OK", ...listExampleProjects().map((entry) => `PROJECT:${entry.id}|${json(entry.title)}`)],
  ],
  [
    "start",
    (flags) => {
      const stateOut = flags.require("state-out");
      const project = loadProjectSource(resolveProjectSource(flags.get("project"), flags.get("example")));
      const { runtime, boundary } = startProject(project);
      return settle({ project, runtime }, boundary, stateOut);
    },
  ],
  [
    "choose",
    (flags) => {
      const stateOut = flags.require("state-out");
      const choice = parseChoiceIndex(flags.require("choice"));
      const session = resume(flags);
      return settle(session, chooseAndContinue(session.runtime, choice), stateOut);
    },
  ],
  [
    "input",
    (flags) => {
      const stateOut = flags.require("state-out");
      const text = flags.require("text");
      const session = resume(flags);
      return settle(session, submitInputAndContinue(session.runtime, text), stateOut);
    },
  ],
]);

const dispatch = (argv: readonly string[]): string[] => {
  const [name, ...rest] = argv;
  if (!name) {
    throw new VnScriptError("CLI_AGENT_USAGE", `Missing agent subcommand. ${SUBCOMMAND_HINT}`);
  }
  const subcommand = SUBCOMMANDS.get(name);
  if (!subcommand) {
    throw new VnScriptError("CLI_AGENT_USAGE", `Unknown agent subcommand: ${name}. ${SUBCOMMAND_HINT}`);
  }
  return subcommand(FlagSet.parse(rest));
};

/** Runs one agent step and prints its line protocol; returns the exit code. */
export const runAgentCommand = (
  argv: readonly string[],
  writeLine: LineWriter = (line) => {
    process.stdout.write(`${line}\n`);
  }
): number => {
  let lines: string[];
  let exitCode = 0;
  try {
    lines = dispatch(argv);
  } catch (error: unknown) {
    lines = errorLines(error);
    exitCode = 1;
  }
  for (const line of lines) {
    writeLine(line);
  }
  return exitCode;
};
