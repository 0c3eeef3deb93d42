import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import { runAgentCommand } from "../../../../src/cli/commands/agent.js";
import { getExampleProjectsRoot } from "../../../../src/cli/core/project-loader.js";
import { loadPlayerState } from "../../../../src/cli/core/state-store.js";

const runWithCapture = (argv: string[]) => {
  const lines: string[] = [];
  const code = runAgentCommand(argv, (line) => lines.push(line));
  return { code, lines };
};

const tempState = (name: string): string =>
  path.join(fs.mkdtempSync(path.join(os.tmpdir(), "vnscript-agent-")), name);

const expectError = (argv: string[], code: string, message?: string): void => {
  const result = runWithCapture(argv);
  assert.equal(result.code, 1);
  assert.equal(result.lines[0], "RESULT:ERROR");
  assert.equal(result.lines[1], `ERROR_CODE:${code}`);
  if (message !== undefined) {
    assert.equal(result.lines[2], `ERROR_MSG_JSON:${JSON.stringify(message)}`);
  }
};

test("agent list prints every example project", () => {
  const result = runWithCapture(["list"]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.lines, [
    "RESULT:OK",
    'PROJECT:01-hello|"Hello"',
    'PROJECT:02-crossroads|"Crossroads"',
    'PROJECT:03-name-entry|"Name Entry"',
    'PROJECT:04-chapters|"Chapters"',
    'PROJECT:05-town-map|"Town Map"',
  ]);
});

test("agent start runs past the title menu to the end without a state file", () => {
  const stateOut = tempState("hello.json");
  const result = runWithCapture(["start", "--example", "01-hello", "--state-out", stateOut]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.lines, [
    "RESULT:OK",
    "EVENT:END",
    `TEXT_JSON:${JSON.stringify("Ava: Hello there.")}`,
    `TEXT_JSON:${JSON.stringify("The room is quiet.")}`,
    "STATE_OUT:NONE",
  ]);
  assert.equal(fs.existsSync(stateOut), false);
});

test("agent start and choose walk a branching story", () => {
  const stateOut = tempState("crossroads.json");
  const start = runWithCapture(["start", "--example", "02-crossroads", "--state-out", stateOut]);
  assert.deepEqual(start.lines, [
    "RESULT:OK",
    "EVENT:CHOICES",
    `TEXT_JSON:${JSON.stringify("A fork in the road.")}`,
    `PROMPT_JSON:${JSON.stringify("Which way?")}`,
    `CHOICE:0|${JSON.stringify("Left")}`,
    `CHOICE:1|${JSON.stringify("Right")}`,
    `STATE_OUT:${stateOut}`,
  ]);
  const state = loadPlayerState(stateOut);
  assert.equal(state.projectId, path.join(getExampleProjectsRoot(), "02-crossroads"));

  const leftOut = tempState("left.json");
  const left = runWithCapture(["choose", "--state-in", stateOut, "--choice", "0", "--state-out", leftOut]);
  assert.equal(left.code, 0);
  assert.deepEqual(left.lines, [
    "RESULT:OK",
    "EVENT:END",
    `TEXT_JSON:${JSON.stringify("You go left.")}`,
    `TEXT_JSON:${JSON.stringify("You feel brave.")}`,
    `TEXT_JSON:${JSON.stringify("The end.")}`,
    "STATE_OUT:NONE",
  ]);

  const rightOut = tempState("right.json");
  const right = runWithCapture(["choose", "--state-in", stateOut, "--choice", "1", "--state-out", rightOut]);
  assert.deepEqual(right.lines, [
    "RESULT:OK",
    "EVENT:CHOICES",
    `TEXT_JSON:${JSON.stringify("You go right.")}`,
    `PROMPT_JSON:${JSON.stringify("Turn back?")}`,
    `CHOICE:0|${JSON.stringify("Yes")}`,
    `CHOICE:1|${JSON.stringify("No")}`,
    `STATE_OUT:${rightOut}`,
  ]);
  assert.equal(fs.existsSync(rightOut), true);
});

test("agent input submits text or falls back to the default", () => {
  const stateOut = tempState("name.json");
  const start = runWithCapture(["start", "--example", "03-name-entry", "--state-out", stateOut]);
  assert.deepEqual(start.lines, [
    "RESULT:OK",
    "EVENT:INPUT",
    `PROMPT_JSON:${JSON.stringify("What is your name?")}`,
    `INPUT_DEFAULT_JSON:${JSON.stringify("Sam")}`,
    `STATE_OUT:${stateOut}`,
  ]);

  const typed = runWithCapture(["input", "--state-in", stateOut, "--text", "Mira", "--state-out", tempState("a.json")]);
  assert.deepEqual(typed.lines, ["RESULT:OK", "EVENT:END", `TEXT_JSON:${JSON.stringify("Welcome, Mira.")}`, "STATE_OUT:NONE"]);

  const blank = runWithCapture(["input", "--state-in", stateOut, "--text", "", "--state-out", tempState("b.json")]);
  assert.deepEqual(blank.lines, ["RESULT:OK", "EVENT:END", `TEXT_JSON:${JSON.stringify("Welcome, Sam.")}`, "STATE_OUT:NONE"]);
});

test("agent follows includes, calls and phone messages across scripts", () => {
  const stateOut = tempState("chapters.json");
  const start = runWithCapture(["start", "--example", "04-chapters", "--state-out", stateOut]);
  assert.deepEqual(start.lines, [
    "RESULT:OK",
    "EVENT:CHOICES",
    `TEXT_JSON:${JSON.stringify("Chapter one begins.")}`,
    `TEXT_JSON:${JSON.stringify("A shared scene.")}`,
    `TEXT_JSON:${JSON.stringify("[phone] Rin: Are you there?")}`,
    `TEXT_JSON:${JSON.stringify("[phone] me: On my way.")}`,
    `PROMPT_JSON:${JSON.stringify("Go inside?")}`,
    `CHOICE:0|${JSON.stringify("Yes")}`,
    `CHOICE:1|${JSON.stringify("No")}`,
    `STATE_OUT:${stateOut}`,
  ]);
  assert.equal(loadPlayerState(stateOut).save.script_path, "chapter2.vn");

  const next = runWithCapture(["choose", "--state-in", stateOut, "--choice", "0", "--state-out", tempState("c.json")]);
  assert.deepEqual(next.lines, [
    "RESULT:OK",
    "EVENT:END",
    `TEXT_JSON:${JSON.stringify("You step in.")}`,
    `TEXT_JSON:${JSON.stringify("Night falls.")}`,
    "STATE_OUT:NONE",
  ]);
});

test("agent offers map points as choices", () => {
  const stateOut = tempState("map.json");
  const start = runWithCapture(["start", "--example", "05-town-map", "--state-out", stateOut]);
  assert.deepEqual(start.lines, [
    "RESULT:OK",
    "EVENT:CHOICES",
    `TEXT_JSON:${JSON.stringify("Where to?")}`,
    `CHOICE:0|${JSON.stringify("Bakery")}`,
    `CHOICE:1|${JSON.stringify("Harbor")}`,
    `STATE_OUT:${stateOut}`,
  ]);
  const harbor = runWithCapture(["choose", "--state-in", stateOut, "--choice", "1", "--state-out", tempState("h.json")]);
  assert.deepEqual(harbor.lines, [
    "RESULT:OK",
    "EVENT:END",
    `TEXT_JSON:${JSON.stringify("Gulls circle.")}`,
    `TEXT_JSON:${JSON.stringify("Back home.")}`,
    "STATE_OUT:NONE",
  ]);
});

test("agent start accepts a project directory", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "vnscript-agent-project-"));
  fs.writeFileSync(path.join(dir, "main.vn"), '"Plain project.";');
  const result = runWithCapture(["start", "--project", dir, "--state-out", tempState("p.json")]);
  assert.deepEqual(result.lines, ["RESULT:OK", "EVENT:END", `TEXT_JSON:${JSON.stringify("Plain project.")}`, "STATE_OUT:NONE"]);
});

test("agent argument errors", () => {
  expectError([], "CLI_AGENT_USAGE", "Missing agent subcommand. Use list/start/choose/input.");
  expectError(["bogus"], "CLI_AGENT_USAGE", "Unknown agent subcommand: bogus. Use list/start/choose/input.");
  expectError(["start", "stray"], "CLI_ARG_FORMAT", "Unexpected argument: stray");
  expectError(["start", "--example"], "CLI_ARG_MISSING", "Missing value for --example");
  expectError(["start", "--example", "01-hello"], "CLI_ARG_REQUIRED", "Missing required argument --state-out");
  expectError(["start", "--state-out", "x.json"], "CLI_SOURCE_REQUIRED");
  expectError(["start", "--example", "01-hello", "--project", "/tmp", "--state-out", "x.json"], "CLI_SOURCE_CONFLICT");
  expectError(["start", "--example", "99-none", "--state-out", "x.json"], "CLI_EXAMPLE_NOT_FOUND", "Unknown example project: 99-none");
  expectError(["choose", "--state-out", "x.json", "--choice", "abc"], "CLI_CHOICE_PARSE", "Invalid choice index: abc");
  expectError(["choose", "--state-out", "x.json", "--choice", "0"], "CLI_ARG_REQUIRED", "Missing required argument --state-in");
  expectError(["input", "--state-out", "x.json"], "CLI_ARG_REQUIRED", "Missing required argument --text");
});

test("agent resume errors come from state and runtime", () => {
  const missing = tempState("missing.json");
  expectError(
    ["choose", "--state-in", missing, "--choice", "0", "--state-out", tempState("o.json")],
    "CLI_STATE_NOT_FOUND",
    `State file does not exist: ${missing}`
  );

  const stateOut = tempState("crossroads.json");
  runWithCapture(["start", "--example", "02-crossroads", "--state-out", stateOut]);
  expectError(
    ["choose", "--state-in", stateOut, "--choice", "5", "--state-out", tempState("o.json")],
    "RUNTIME_CHOICE_INDEX",
    "Choice index 5 is out of range."
  );
  expectError(
    ["input", "--state-in", stateOut, "--text", "hi", "--state-out", tempState("o.json")],
    "RUNTIME_NO_PENDING_INPUT",
    "No pending input."
  );
});
