import assert from "node:assert/strict";

import { test, vi } from "vitest";

import { VnScriptError } from "../../../../src/core/errors.js";
import type { BoundaryResult } from "../../../../src/cli/core/engine-runner.js";
import {
  DEFAULT_STATE_FILE,
  formatHudLine,
  initialView,
  isStreaming,
  parseTuiArgs,
  runTuiCommand,
  truncateToWidth,
  viewReducer,
  visibleLines,
  wrapLineToWidth,
} from "../../../../src/cli/commands/tui.js";

const errorCode = (fn: () => unknown): string => {
  let code = "";
  try {
    fn();
  } catch (error: unknown) {
    assert.ok(error instanceof VnScriptError);
    code = error.code;
  }
  return code;
};

const captureStderr = () => {
  const writes: string[] = [];
  const spy = vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    writes.push(String(chunk));
    return true;
  });
  return { writes, restore: () => spy.mockRestore() };
};

const choices = (texts: string[], prompt: string | null = null): BoundaryResult => ({
  event: "CHOICES",
  texts: [],
  choices: texts.map((text, index) => ({ index, text })),
  choicePromptText: prompt,
  inputPromptText: null,
  inputDefaultText: null,
});

test("parseTuiArgs parses a source selector and optional state-file", () => {
  assert.deepEqual(parseTuiArgs(["--example", "01-hello"]), {
    source: { kind: "example", id: "01-hello" },
    stateFile: DEFAULT_STATE_FILE,
  });
  assert.deepEqual(parseTuiArgs(["--project", "/tmp/game", "--state-file", "/tmp/s.json"]), {
    source: { kind: "project", dir: "/tmp/game" },
    stateFile: "/tmp/s.json",
  });
});

test("parseTuiArgs validates required, conflicting and unknown args", () => {
  assert.equal(errorCode(() => parseTuiArgs([])), "CLI_SOURCE_REQUIRED");
  assert.equal(errorCode(() => parseTuiArgs(["--example"])), "CLI_ARG_MISSING");
  assert.equal(errorCode(() => parseTuiArgs(["--example", "a", "--project", "b"])), "CLI_SOURCE_CONFLICT");
  assert.equal(errorCode(() => parseTuiArgs(["--example", "a", "--unknown", "x"])), "CLI_ARG_FORMAT");
  assert.equal(errorCode(() => parseTuiArgs(["--example", "a", "--state-file"])), "CLI_ARG_MISSING");
  assert.equal(errorCode(() => parseTuiArgs(["--example", "a", "--state-file", ""])), "CLI_ARG_MISSING");
});

test("truncateToWidth keeps short text and marks cut text", () => {
  assert.equal(truncateToWidth("hello", 10), "hello");
  assert.equal(truncateToWidth("hello world", 6), "hello…");
  assert.equal(truncateToWidth("hello", 1), "…");
  assert.equal(truncateToWidth("hello", 0), "");
});

test("wrapLineToWidth breaks at spaces and splits long words", () => {
  assert.deepEqual(wrapLineToWidth("the quick fox", 9), ["the quick", "fox"]);
  assert.deepEqual(wrapLineToWidth("abcdefg", 3), ["abc", "def", "g"]);
  assert.deepEqual(wrapLineToWidth("go abcdefg", 4), ["go", "abcd", "efg"]);
  assert.deepEqual(wrapLineToWidth("", 3), [""]);
  assert.deepEqual(wrapLineToWidth("abc", 0), [""]);
});

test("formatHudLine joins meters, item count and notification", () => {
  assert.equal(
    formatHudLine({
      meters: new Map([["hp", { label: "HP", min: 0, max: 10, value: 7 }]]),
      inventory: new Map([["key", { name: "Key", description: "", count: 2 }]]),
      notification: { message: "Saved", untilMs: 0 },
    }),
    "HP 7/10 | items 1 | Saved"
  );
  assert.equal(formatHudLine({ meters: new Map(), inventory: new Map(), notification: null }), null);
});

test("view types lines one character per tick and keeps blank lines", () => {
  let view = initialView({ ...choices(["A", "B"], "Pick"), texts: ["Hi.", "", "Go."] }, "HP 3/5");
  assert.equal(view.prompt, "Pick");
  assert.equal(view.hud, "HP 3/5");
  assert.equal(isStreaming(view), true);

  view = viewReducer(view, { type: "tick" });
  assert.deepEqual(visibleLines(view), ["H"]);
  view = viewReducer(viewReducer(view, { type: "tick" }), { type: "tick" });
  assert.deepEqual(visibleLines(view), ["Hi."]);
  view = viewReducer(view, { type: "tick" });
  assert.equal(view.typing, null);
  view = viewReducer(view, { type: "tick" });
  assert.deepEqual(view.lines, ["Hi.", ""]);
  assert.deepEqual(view.pending, ["Go."]);

  view = viewReducer(view, { type: "flush" });
  assert.deepEqual(view.lines, ["Hi.", "", "Go."]);
  assert.equal(isStreaming(view), false);
  assert.equal(viewReducer(view, { type: "tick" }), view);
});

test("view cursor clamps and scrolls through long choice lists", () => {
  let view = initialView(choices(["a", "b", "c", "d", "e", "f", "g"]), null);
  view = viewReducer(view, { type: "move", delta: -1 });
  assert.equal(view.cursor, 0);
  for (let step = 0; step < 6; step += 1) {
    view = viewReducer(view, { type: "move", delta: 1 });
  }
  assert.equal(view.cursor, 6);
  assert.equal(view.scroll, 2);
  view = viewReducer(view, { type: "move", delta: 1 });
  assert.equal(view.cursor, 6);
  view = viewReducer(view, { type: "move", delta: -1 });
  assert.equal(view.cursor, 5);
  assert.equal(view.scroll, 2);
});

test("view appends an input boundary and edits the buffer", () => {
  let view = viewReducer(initialView({ ...choices(["A"]), texts: ["Hi."] }, null), { type: "flush" });
  view = viewReducer(view, {
    type: "boundary",
    boundary: {
      event: "INPUT",
      texts: ["Name?"],
      choices: [],
      choicePromptText: null,
      inputPromptText: "Who?",
      inputDefaultText: "Sam",
    },
    hud: null,
    replace: false,
    notice: "chose 0",
  });
  assert.deepEqual(view.lines, ["Hi."]);
  assert.deepEqual(view.pending, ["Name?"]);
  assert.equal(view.inputMode, true);
  assert.equal(view.inputDefault, "Sam");
  assert.equal(view.prompt, "Who?");
  assert.equal(view.notice, "chose 0");

  view = viewReducer(viewReducer(view, { type: "type", text: "Mi" }), { type: "type", text: "ra" });
  view = viewReducer(view, { type: "erase" });
  assert.equal(view.buffer, "Mir");
  assert.equal(viewReducer(view, { type: "move", delta: 1 }).notice, "no pending choice");

  view = viewReducer(view, {
    type: "boundary",
    boundary: { ...choices([]), event: "END", texts: ["Bye."] },
    hud: null,
    replace: true,
    notice: "restarted",
  });
  assert.deepEqual(view.lines, []);
  assert.deepEqual(view.pending, ["Bye."]);
  assert.equal(view.ended, true);
  assert.equal(view.buffer, "");
});

test("runTuiCommand returns non-zero on argument errors", async () => {
  const stderr = captureStderr();
  try {
    assert.equal(await runTuiCommand([]), 1);
    assert.equal(stderr.writes.join(""), "Missing source selector. Use --project <dir> or --example <id>.\n");
  } finally {
    stderr.restore();
  }
});

test("runTuiCommand reports an unknown example", async () => {
  const stderr = captureStderr();
  try {
    assert.equal(await runTuiCommand(["--example", "99-none"]), 1);
    assert.equal(stderr.writes.join(""), "Unknown example project: 99-none\n");
  } finally {
    stderr.restore();
  }
});
