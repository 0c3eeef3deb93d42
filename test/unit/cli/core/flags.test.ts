import assert from "node:assert/strict";

import { test } from "vitest";

import { VnScriptError } from "../../../../src/core/errors.js";
import { FlagSet } from "../../../../src/cli/core/flags.js";

const rejects = (args: string[], code: string, message: string): void => {
  assert.throws(
    () => FlagSet.parse(args),
    (error: unknown) => {
      assert.ok(error instanceof VnScriptError);
      assert.equal(error.code, code);
      assert.equal(error.message, message);
      return true;
    }
  );
};

test("FlagSet reads name/value pairs and keeps the last repeat", () => {
  const flags = FlagSet.parse(["--example", "01-hello", "--text", "", "--example", "02-crossroads"]);
  assert.deepEqual(flags.names(), ["example", "text"]);
  assert.equal(flags.get("example"), "02-crossroads");
  assert.equal(flags.require("text"), "");
  assert.equal(flags.get("project"), undefined);
});

test("FlagSet rejects bare words and dangling flags", () => {
  rejects(["stray"], "CLI_ARG_FORMAT", "Unexpected argument: stray");
  rejects(["--choice"], "CLI_ARG_MISSING", "Missing value for --choice");
  rejects(["--choice", "--state-out", "x"], "CLI_ARG_MISSING", "Missing value for --choice");
});

test("FlagSet.require names the missing flag", () => {
  assert.throws(
    () => FlagSet.parse([]).require("state-in"),
    (error: unknown) => {
      assert.ok(error instanceof VnScriptError);
      assert.equal(error.code, "CLI_ARG_REQUIRED");
      assert.equal(error.message, "Missing required argument --state-in");
      return true;
    }
  );
});
