import assert from "node:assert/strict";
import { test } from "vitest";

import * as vnscript from "../../src/index.js";

test("package entry exposes the compiler, runtime and API", () => {
  assert.equal(vnscript.VN_SCRIPT_VERSION, "0.1.0");
  assert.equal(typeof vnscript.tokenize, "function");
  assert.equal(typeof vnscript.parseScriptSource, "function");
  assert.equal(typeof vnscript.ScriptLoader, "function");
  assert.equal(typeof vnscript.VnRuntime, "function");
  assert.equal(typeof vnscript.encodeSave, "function");
  assert.equal(typeof vnscript.createRuntime, "function");
  assert.equal(typeof vnscript.createLogger, "function");
  assert.ok(new vnscript.VnScriptError("X", "y") instanceof Error);
});
