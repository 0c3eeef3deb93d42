import fs from "node:fs";
import path from "node:path";

import { VnScriptError } from "../core/errors.js";
import type { Command, Program } from "../core/types.js";
import { BLOCK_STATEMENTS } from "./blocks.js";
import { TokenCursor } from "./cursor.js";
import {
  SIMPLE_STATEMENTS,
  parseSay,
  type ParseSession,
  type StatementContext,
  type StatementParser,
} from "./grammar.js";
import { tokenize } from "./lexer.js";

export interface ScriptSourceReader {
  exists(filePath: string): boolean;
  read(filePath: string): string;
}

export const fsSourceReader: ScriptSourceReader = {
  exists: (filePath) => fs.existsSync(filePath) && fs.statSync(filePath).isFile(),
  read: (filePath) => fs.readFileSync(filePath, "utf8"),
};

export interface ParseOptions {
  reader?: ScriptSourceReader;
  /** Rejects jump-like targets that do not name a label of the merged program. */
  strictLabels?: boolean;
  session?: ParseSession;
}

/** Targets that the runtime handles itself and that never name a label. */
export const RESERVED_TARGETS: ReadonlySet<string> = new Set(["inventory_toggle"]);

const STATEMENTS: Readonly<Record<string, StatementParser>> = {
  ...SIMPLE_STATEMENTS,
  ...BLOCK_STATEMENTS,
};

interface FileUnit {
  commands: Command[];
  labels: Record<string, number>;
}

interface ParseEnv {
  reader: ScriptSourceReader;
  session: ParseSession;
  stack: string[];
}

type Rename = (name: string) => string;

/** Rewrites every jump-like target (and, when given, label names) of a command. */
export const mapTargets = (command: Command, target: Rename, label?: Rename): Command => {
  switch (command.kind) {
    case "label":
      return label ? { ...command, name: label(command.name) } : command;
    case "jump":
    case "ifJump":
    case "hotspotAdd":
    case "hotspotPoly":
    case "hudAdd":
      return { ...command, target: target(command.target) };
    case "choice":
      return {
        ...command,
        options: command.options.map((option) => ({ ...option, target: target(option.target) })),
      };
    case "map":
      return command.action === "poi" ? { ...command, target: target(command.target) } : command;
    default:
      return command;
  }
};

export const collectTargets = (command: Command): string[] => {
  switch (command.kind) {
    case "jump":
    case "ifJump":
    case "hotspotAdd":
    case "hotspotPoly":
    case "hudAdd":
      return [command.target];
    case "choice":
      return command.options.map((option) => option.target);
    case "map":
      return command.action === "poi" ? [command.target] : [];
    default:
      return [];
  }
};

const parseFileUnit = (source: string, filePath: string, env: ParseEnv): FileUnit => {
  const cursor = new TokenCursor(tokenize(source, filePath), filePath);
  const commands: Command[] = [];
  const labels: Record<string, number> = {};
  const includes: Array<{ path: string; alias: string }> = [];
  const baseDir = path.dirname(filePath);

  const resolveScript = (relativePath: string): string => {
    const span = cursor.spanHere();
    const resolved = path.resolve(baseDir, relativePath);
    if (!env.reader.exists(resolved)) {
      throw new VnScriptError(
        "PARSE_FILE_NOT_FOUND",
        `Script file "${relativePath}" not found (resolved to ${resolved}).`,
        span,
        filePath
      );
    }
    return resolved;
  };

  const emit = (command: Command): void => {
    if (command.kind === "label") {
      if (Object.hasOwn(labels, command.name)) {
        cursor.fail("PARSE_DUPLICATE_LABEL", `Duplicate label "${command.name}".`);
      }
      labels[command.name] = commands.length;
    }
    commands.push(command);
  };

  const ctx: StatementContext = {
    cursor,
    session: env.session,
    emit,
    parseBody: () => {
      cursor.expect("lbrace", '"{"');
      while (cursor.peekType() !== "rbrace") {
        if (cursor.atEnd()) {
          cursor.fail("PARSE_UNEXPECTED_EOF", 'Block is not closed with "}".');
        }
        parseStatement();
      }
      cursor.expect("rbrace", '"}"');
      cursor.accept("semi");
    },
    resolveScript,
  };

  /**
   * Included commands are appended after this file's own commands, so a last
   * label without a closing jump falls through into the first included file.
   */
  const parseInclude = (): void => {
    const keyword = cursor.next();
    if (commands.length > 0) {
      cursor.fail("PARSE_INCLUDE_ORDER", "include must appear before any other commands.", keyword.span);
    }
    const includePath = cursor.expectString("include path");
    cursor.expectKeyword("as");
    const alias = cursor.expectWord("include alias");
    cursor.endStatement();
    if (includes.some((entry) => entry.alias === alias)) {
      cursor.fail("PARSE_DUPLICATE_ALIAS", `Include alias "${alias}" is already used.`, keyword.span);
    }
    includes.push({ path: resolveScript(includePath), alias });
  };

  function parseStatement(): void {
    const token = cursor.peek();
    if (!token) {
      return;
    }
    if (token.type === "semi") {
      cursor.next();
      return;
    }
    if (token.type === "string") {
      parseSay(ctx);
      return;
    }
    if (token.type !== "word") {
      cursor.fail("PARSE_UNEXPECTED_TOKEN", `Unexpected "${token.value}" at start of statement.`);
    }
    if (token.value === "label" && cursor.peekType(1) === "word" && cursor.peekType(2) === "colon") {
      cursor.next();
      const name = cursor.expectWord("label name");
      cursor.expect("colon", '":"');
      emit({ kind: "label", name });
      return;
    }
    if (token.value === "include") {
      parseInclude();
      return;
    }
    const statement = Object.hasOwn(STATEMENTS, token.value) ? STATEMENTS[token.value] : undefined;
    if (statement) {
      cursor.next();
      statement(ctx);
      return;
    }
    if (cursor.peekType(1) === "string") {
      cursor.next();
      parseSay(ctx, token.value);
      return;
    }
    cursor.fail("PARSE_UNKNOWN_KEYWORD", `Unknown command "${token.value}".`, token.span);
  }

  while (!cursor.atEnd()) {
    if (cursor.peekType() === "rbrace") {
      cursor.fail("PARSE_UNEXPECTED_TOKEN", 'Unexpected "}" outside of a block.');
    }
    parseStatement();
  }

  for (const include of includes) {
    if (env.stack.includes(include.path)) {
      throw new VnScriptError(
        "PARSE_INCLUDE_CYCLE",
        `Include cycle detected: ${[...env.stack, include.path].join(" -> ")}`,
        undefined,
        filePath
      );
    }
    const unit = parseFileUnit(env.reader.read(include.path), include.path, {
      ...env,
      stack: [...env.stack, include.path],
    });
    const scope = (name: string): string =>
      name.startsWith("::") || RESERVED_TARGETS.has(name) ? name : `${include.alias}.${name}`;
    const offset = commands.length;
    for (const command of unit.commands) {
      commands.push(mapTargets(command, scope, scope));
    }
    for (const [name, index] of Object.entries(unit.labels)) {
      const scoped = `${include.alias}.${name}`;
      if (Object.hasOwn(labels, scoped)) {
        throw new VnScriptError("PARSE_DUPLICATE_LABEL", `Duplicate label "${scoped}".`, undefined, filePath);
      }
      labels[scoped] = offset + index;
    }
  }

  return { commands, labels };
};

const stripRoot = (name: string): string => (name.startsWith("::") ? name.slice(2) : name);

const validateTargets = (program: Program): void => {
  for (const command of program.commands) {
    for (const target of collectTargets(command)) {
      if (!RESERVED_TARGETS.has(target) && !Object.hasOwn(program.labels, target)) {
        throw new VnScriptError(
          "PARSE_LABEL_UNKNOWN",
          `Unknown label "${target}" referenced by ${command.kind}.`,
          undefined,
          program.scriptPath
        );
      }
    }
  }
};

/** Parses script text; `filePath` anchors relative include and call paths. */
export const parseScriptSource = (
  source: string,
  filePath: string,
  options: ParseOptions = {}
): Program => {
  const absolute = path.resolve(filePath);
  const unit = parseFileUnit(source, absolute, {
    reader: options.reader ?? fsSourceReader,
    session: options.session ?? { checkCounter: 0 },
    stack: [absolute],
  });
  const program: Program = {
    scriptPath: absolute,
    commands: unit.commands.map((command) => mapTargets(command, stripRoot)),
    labels: unit.labels,
  };
  if (options.strictLabels) {
    validateTargets(program);
  }
  return program;
};

export const parseScript = (filePath: string, options: ParseOptions = {}): Program => {
  const reader = options.reader ?? fsSourceReader;
  const absolute = path.resolve(filePath);
  if (!reader.exists(absolute)) {
    throw new VnScriptError("PARSE_FILE_NOT_FOUND", `Script file not found: ${absolute}`);
  }
  return parseScriptSource(reader.read(absolute), absolute, { ...options, reader });
};
