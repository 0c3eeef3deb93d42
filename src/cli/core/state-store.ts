import fs from "node:fs";
import path from "node:path";

import { VnScriptError } from "../../core/errors.js";
import { isSaveData, type SaveData } from "../../runtime/save-codec.js";

export const PLAYER_STATE_SCHEMA = "player-state.v1";

/** Agent/TUI state file: the runtime save plus the project it belongs to. */
export interface PlayerState {
  schemaVersion: typeof PLAYER_STATE_SCHEMA;
  projectId: string;
  save: SaveData;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

export const createPlayerState = (projectId: string, save: SaveData): PlayerState => ({
  schemaVersion: PLAYER_STATE_SCHEMA,
  projectId,
  save,
});

export const savePlayerState = (statePath: string, state: PlayerState): void => {
  fs.mkdirSync(path.dirname(path.resolve(statePath)), { recursive: true });
  const tmpPath = `${statePath}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(state), "utf8");
  fs.renameSync(tmpPath, statePath);
};

export const loadPlayerState = (statePath: string): PlayerState => {
  if (!fs.existsSync(statePath)) {
    throw new VnScriptError("CLI_STATE_NOT_FOUND", `State file does not exist: ${statePath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(statePath, "utf8"));
  } catch {
    throw new VnScriptError("CLI_STATE_INVALID", "State file is invalid.");
  }
  if (!isRecord(parsed)) {
    throw new VnScriptError("CLI_STATE_INVALID", "State file is invalid.");
  }
  if (parsed.schemaVersion !== PLAYER_STATE_SCHEMA) {
    throw new VnScriptError("CLI_STATE_SCHEMA", `Unsupported player state schema: ${String(parsed.schemaVersion)}`);
  }
  if (typeof parsed.projectId !== "string" || parsed.projectId.length === 0) {
    throw new VnScriptError("CLI_STATE_INVALID", "State is missing projectId.");
  }
  if (!isSaveData(parsed.save)) {
    throw new VnScriptError("CLI_STATE_INVALID", "State save payload is invalid.");
  }
  return { schemaVersion: PLAYER_STATE_SCHEMA, projectId: parsed.projectId, save: parsed.save };
};
