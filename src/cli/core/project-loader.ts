import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { VnScriptError } from "../../core/errors.js";
import {
  isMenuAction,
  type FeatureFlags,
  type MenuButton,
  type MenuConfig,
  type UiConfigOverrides,
} from "../../runtime/config.js";

export const PROJECT_FILE = "project.json";
const DEFAULT_ENTRY = "main.vn";
const DEFAULT_SAVE = "saves/quick.json";

export interface LoadedProject {
  /** Absolute project directory; player state files point back at it. */
  id: string;
  title: string;
  root: string;
  entryPath: string;
  savePath: string;
  ui: UiConfigOverrides;
  features: Partial<FeatureFlags>;
}

export interface ProjectSummary {
  id: string;
  title: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const invalid = (file: string, detail: string): VnScriptError =>
  new VnScriptError("CLI_PROJECT_INVALID", `${file}: ${detail}`);

const findPackageRoot = (): string => {
  let current = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new VnScriptError("CLI_PROJECT_ROOT", "Cannot locate package root from CLI module path.");
    }
    current = parent;
  }
};

export const getExampleProjectsRoot = (): string => path.join(findPackageRoot(), "examples", "projects");

const readOptionalString = (source: Record<string, unknown>, key: string, file: string): string | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.length === 0) {
    throw invalid(file, `"${key}" must be a non-empty string.`);
  }
  return value;
};

const readOptionalNumber = (source: Record<string, unknown>, key: string, file: string): number | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw invalid(file, `"${key}" must be a positive number.`);
  }
  return value;
};

const readOptionalBool = (source: Record<string, unknown>, key: string, file: string): boolean | undefined => {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw invalid(file, `"${key}" must be a boolean.`);
  }
  return value;
};

const readMenu = (value: unknown, key: string, file: string): Partial<MenuConfig> | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw invalid(file, `"ui.${key}" must be an object.`);
  }
  const menu: Partial<MenuConfig> = {};
  const enabled = readOptionalBool(value, "enabled", file);
  if (enabled !== undefined) {
    menu.enabled = enabled;
  }
  if (value.buttons !== undefined) {
    if (!Array.isArray(value.buttons)) {
      throw invalid(file, `"ui.${key}.buttons" must be an array.`);
    }
    const buttons: MenuButton[] = [];
    for (const entry of value.buttons) {
      if (!isRecord(entry) || typeof entry.label !== "string" || !isMenuAction(entry.action)) {
        throw invalid(file, `"ui.${key}.buttons" entries need a label and a known action.`);
      }
      buttons.push({ label: entry.label, action: entry.action });
    }
    menu.buttons = buttons;
  }
  return menu;
};

const readUi = (value: unknown, file: string): UiConfigOverrides => {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw invalid(file, `"ui" must be an object.`);
  }
  const ui: UiConfigOverrides = {
    titleMenu: readMenu(value.titleMenu, "titleMenu", file),
    pauseMenu: readMenu(value.pauseMenu, "pauseMenu", file),
    slots: readOptionalNumber(value, "slots", file),
    inventoryItemsPerPage: readOptionalNumber(value, "inventoryItemsPerPage", file),
    notifySeconds: readOptionalNumber(value, "notifySeconds", file),
    mapPointRadius: readOptionalNumber(value, "mapPointRadius", file),
  };
  for (const key of Object.keys(ui)) {
    if (Reflect.get(ui, key) === undefined) {
      Reflect.deleteProperty(ui, key);
    }
  }
  return ui;
};

const readFeatures = (value: unknown, file: string): Partial<FeatureFlags> => {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw invalid(file, `"features" must be an object.`);
  }
  const features: Partial<FeatureFlags> = {};
  const items = readOptionalBool(value, "items", file);
  const hud = readOptionalBool(value, "hud", file);
  if (items !== undefined) {
    features.items = items;
  }
  if (hud !== undefined) {
    features.hud = hud;
  }
  return features;
};

const readProjectFile = (file: string): Record<string, unknown> => {
  if (!fs.existsSync(file)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalid(file, `not valid JSON (${message}).`);
  }
  if (!isRecord(parsed)) {
    throw invalid(file, "top level must be an object.");
  }
  return parsed;
};

/** Reads `project.json` from a project directory; every key is optional. */
export const loadProjectFromDir = (projectDir: string): LoadedProject => {
  const root = path.resolve(projectDir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new VnScriptError("CLI_PROJECT_NOT_FOUND", `Project directory does not exist: ${root}`);
  }
  const file = path.join(root, PROJECT_FILE);
  const config = readProjectFile(file);
  const entry = readOptionalString(config, "entry", file) ?? DEFAULT_ENTRY;
  const entryPath = path.resolve(root, entry);
  if (!fs.existsSync(entryPath)) {
    throw new VnScriptError("CLI_ENTRY_NOT_FOUND", `Entry script does not exist: ${entryPath}`);
  }
  return {
    id: root,
    title: readOptionalString(config, "name", file) ?? path.basename(root),
    root,
    entryPath,
    savePath: path.resolve(root, readOptionalString(config, "saves", file) ?? DEFAULT_SAVE),
    ui: readUi(config.ui, file),
    features: readFeatures(config.features, file),
  };
};

export const loadExampleProject = (exampleId: string): LoadedProject => {
  const dir = path.join(getExampleProjectsRoot(), exampleId);
  if (!fs.existsSync(path.join(dir, PROJECT_FILE))) {
    throw new VnScriptError("CLI_EXAMPLE_NOT_FOUND", `Unknown example project: ${exampleId}`);
  }
  return loadProjectFromDir(dir);
};

/** Where a player command takes its project from. */
export type ProjectSource = { kind: "project"; dir: string } | { kind: "example"; id: string };

/** Exactly one of `--project` and `--example` must be given. */
export const resolveProjectSource = (projectDir: string | undefined, exampleId: string | undefined): ProjectSource => {
  if (projectDir !== undefined && exampleId !== undefined) {
    throw new VnScriptError("CLI_SOURCE_CONFLICT", "Use exactly one source selector: --project <dir> or --example <id>.");
  }
  if (projectDir !== undefined) {
    return { kind: "project", dir: projectDir };
  }
  if (exampleId !== undefined) {
    return { kind: "example", id: exampleId };
  }
  throw new VnScriptError("CLI_SOURCE_REQUIRED", "Missing source selector. Use --project <dir> or --example <id>.");
};

export const loadProjectSource = (source: ProjectSource): LoadedProject =>
  source.kind === "project" ? loadProjectFromDir(source.dir) : loadExampleProject(source.id);

export const listExampleProjects = (): ProjectSummary[] => {
  const root = getExampleProjectsRoot();
  if (!fs.existsSync(root)) {
    return [];
  }
  return fs
    .readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && fs.existsSync(path.join(root, entry.name, PROJECT_FILE)))
    .map((entry) => entry.name)
    .sort()
    .map((id) => ({ id, title: loadExampleProject(id).title }));
};
