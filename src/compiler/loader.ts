import path from "node:path";

import type { Program } from "../core/types.js";
import { createLogger } from "../core/logger.js";
import { fsSourceReader, parseScript, type ScriptSourceReader } from "./parser.js";

const log = createLogger("loader");

export interface ScriptLoaderOptions {
  reader?: ScriptSourceReader;
  strictLabels?: boolean;
}

/** Memoizes parsed programs by absolute path. */
export class ScriptLoader {
  private readonly cache = new Map<string, Program>();
  private readonly reader: ScriptSourceReader;
  private readonly strictLabels: boolean;

  constructor(options: ScriptLoaderOptions = {}) {
    this.reader = options.reader ?? fsSourceReader;
    this.strictLabels = options.strictLabels ?? false;
  }

  load(scriptPath: string): Program {
    const absolute = path.resolve(scriptPath);
    const cached = this.cache.get(absolute);
    if (cached) {
      return cached;
    }
    log.debug(`parsing ${absolute}`);
    const program = parseScript(absolute, { reader: this.reader, strictLabels: this.strictLabels });
    this.cache.set(absolute, program);
    return program;
  }

  /** Seeds the cache with an already parsed program. */
  remember(program: Program): void {
    this.cache.set(path.resolve(program.scriptPath), program);
  }

  has(scriptPath: string): boolean {
    return this.cache.has(path.resolve(scriptPath));
  }

  evict(scriptPath: string): boolean {
    return this.cache.delete(path.resolve(scriptPath));
  }

  clear(): void {
    this.cache.clear();
  }

  cachedPaths(): string[] {
    return [...this.cache.keys()];
  }
}
