import path from "node:path";

import { ScriptLoader } from "./compiler/loader.js";
import { parseScriptSource, type ScriptSourceReader } from "./compiler/parser.js";
import { VnScriptError } from "./core/errors.js";
import type { Program } from "./core/types.js";
import type { SaveData } from "./runtime/save-codec.js";
import { VnRuntime, type RuntimeOptions } from "./runtime/interpreter.js";

export interface LoadProgramOptions {
  /** In-memory script text; the file is read through the loader when absent. */
  source?: string;
  loader?: ScriptLoader;
  reader?: ScriptSourceReader;
  strictLabels?: boolean;
}

export const loadProgram = (scriptPath: string, options: LoadProgramOptions = {}): Program => {
  const absolute = path.resolve(scriptPath);
  if (options.source !== undefined) {
    const program = parseScriptSource(options.source, absolute, {
      reader: options.reader,
      strictLabels: options.strictLabels,
    });
    options.loader?.remember(program);
    return program;
  }
  const loader = options.loader ?? new ScriptLoader({ reader: options.reader, strictLabels: options.strictLabels });
  return loader.load(absolute);
};

export interface CreateRuntimeOptions extends Omit<RuntimeOptions, "program"> {
  scriptPath: string;
  source?: string;
  strictLabels?: boolean;
}

const buildRuntime = (options: CreateRuntimeOptions): VnRuntime => {
  const loader = options.loader ?? new ScriptLoader({ strictLabels: options.strictLabels });
  const program = loadProgram(options.scriptPath, {
    source: options.source,
    loader,
    strictLabels: options.strictLabels,
  });
  return new VnRuntime({ ...options, program, loader });
};

/** Parses the entry script and runs it up to the first blocking point. */
export const createRuntime = (options: CreateRuntimeOptions): VnRuntime => {
  const runtime = buildRuntime(options);
  runtime.run();
  return runtime;
};

export interface ResumeRuntimeOptions extends CreateRuntimeOptions {
  save: SaveData;
}

export const resumeRuntime = (options: ResumeRuntimeOptions): VnRuntime => {
  const runtime = buildRuntime(options);
  if (!runtime.restoreSave(options.save)) {
    throw new VnScriptError("API_SAVE_UNUSABLE", `Save for "${options.save.script_path}" cannot be restored.`);
  }
  runtime.menu = null;
  return runtime;
};
