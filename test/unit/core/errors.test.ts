import assert from "node:assert/strict";
import { test } from "vitest";

import { VnScriptError, formatErrorLocation } from "../../../src/core/errors.js";

test("VnScriptError carries code, span and file", () => {
  const span = {
    start: { line: 3, column: 5 },
    end: { line: 3, column: 9 },
  };
  const error = new VnScriptError("X_CODE", "boom", span, "/game/main.vn");
  assert.equal(error.name, "VnScriptError");
  assert.equal(error.code, "X_CODE");
  assert.equal(error.message, "boom");
  assert.deepEqual(error.span, span);
  assert.equal(error.filePath, "/game/main.vn");
  assert.ok(error instanceof Error);
});

test("formatErrorLocation renders file, line and column", () => {
  const span = { start: { line: 2, column: 7 }, end: { line: 2, column: 8 } };
  assert.equal(formatErrorLocation(new VnScriptError("A", "a", span, "/game/main.vn")), "/game/main.vn:2:7");
  assert.equal(formatErrorLocation(new VnScriptError("A", "a", span)), "2:7");
  assert.equal(formatErrorLocation(new VnScriptError("A", "a", undefined, "/game/main.vn")), "/game/main.vn");
  assert.equal(formatErrorLocation(new VnScriptError("A", "a")), "");
});
