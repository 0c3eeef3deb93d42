import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { test } from "vitest";

import { VnScriptError } from "../../../../src/core/errors.js";
import {
  PLAYER_STATE_SCHEMA,
  createPlayerState,
  loadPlayerState,
  savePlayerState,
} from "../../../../src/cli/core/state-store.js";
import { makeRuntime } from "../../../helpers/runtime.js";

const tempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "vnscript-state-"));

const writeJson = (statePath: string, value: unknown): void => {
  fs.writeFileSync(statePath, JSON.stringify(value), "utf8");
};

const expectCode = (statePath: string, code: string, message: string): void => {
  assert.throws(
    () => loadPlayerState(statePath),
    (error: unknown) => {
      assert.ok(error instanceof VnScriptError);
      assert.equal(error.code, code);
      assert.equal(error.message, message);
      return true;
    }
  );
};

const validSave = () => {
  const { runtime } = makeRuntime('set gold 2;\nask "Go?" "Yes" -> done;\nlabel done:');
  runtime.frame([], 0);
  return runtime.snapshot();
};

test("state store save and load roundtrip", () => {
  const save = validSave();
  const statePath = path.join(tempDir(), "nested", "state.json");
  savePlayerState(statePath, createPlayerState("/games/demo", save));
  assert.equal(fs.existsSync(`${statePath}.tmp`), false);

  const loaded = loadPlayerState(statePath);
  assert.equal(loaded.schemaVersion, PLAYER_STATE_SCHEMA);
  assert.equal(loaded.projectId, "/games/demo");
  assert.deepEqual(loaded.save, JSON.parse(JSON.stringify(save)));
});

test("state store rejects missing and malformed files", () => {
  const dir = tempDir();
  const missing = path.join(dir, "missing.json");
  expectCode(missing, "CLI_STATE_NOT_FOUND", `State file does not exist: ${missing}`);

  const broken = path.join(dir, "broken.json");
  fs.writeFileSync(broken, "{", "utf8");
  expectCode(broken, "CLI_STATE_INVALID", "State file is invalid.");

  const array = path.join(dir, "array.json");
  writeJson(array, []);
  expectCode(array, "CLI_STATE_INVALID", "State file is invalid.");

  const schema = path.join(dir, "schema.json");
  writeJson(schema, { schemaVersion: "player-state.v0", projectId: "x", save: validSave() });
  expectCode(schema, "CLI_STATE_SCHEMA", "Unsupported player state schema: player-state.v0");

  const noProject = path.join(dir, "no-project.json");
  writeJson(noProject, { schemaVersion: PLAYER_STATE_SCHEMA, projectId: "", save: validSave() });
  expectCode(noProject, "CLI_STATE_INVALID", "State is missing projectId.");

  const badSave = path.join(dir, "bad-save.json");
  writeJson(badSave, { schemaVersion: PLAYER_STATE_SCHEMA, projectId: "x", save: { index: 0 } });
  expectCode(badSave, "CLI_STATE_INVALID", "State save payload is invalid.");
});
