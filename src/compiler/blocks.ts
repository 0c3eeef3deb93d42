import type { ChoiceOption, CompareOp, Point } from "../core/types.js";
import type { TokenCursor } from "./cursor.js";
import { ANCHOR_WORDS, dropUndefined, parseOperand, type StatementParser } from "./grammar.js";

const INVERTED_OPS: Record<CompareOp, CompareOp> = {
  "==": "!=",
  "!=": "==",
  ">": "<=",
  ">=": "<",
  "<": ">=",
  "<=": ">",
};

const COMPARE_OPS: readonly CompareOp[] = ["==", "!=", ">", ">=", "<", "<="];

export const invertOp = (op: CompareOp): CompareOp => INVERTED_OPS[op];

export const CHECK_SKIP_PREFIX = "__check_skip_";

const closeBlock = (cursor: TokenCursor): void => {
  cursor.expect("rbrace", '"}"');
  cursor.accept("semi");
};

const parseCharacter: StatementParser = ({ cursor, emit }) => {
  const ident = cursor.expectWord("character id");
  cursor.expect("lbrace", '"{"');
  let displayName: string | undefined;
  let color: string | undefined;
  let voiceTag: string | undefined;
  let pos: Point | undefined;
  let anchor: string | undefined;
  let z: number | undefined;
  let floatAmp: number | undefined;
  let floatSpeed: number | undefined;
  const sprites: Record<string, string> = {};

  while (cursor.peekType() !== "rbrace") {
    const fieldToken = cursor.expect("word", "character field");
    switch (fieldToken.value) {
      case "name":
        displayName = cursor.expectString("character name");
        break;
      case "color": {
        const token = cursor.next();
        if (token.type !== "color" && token.type !== "string") {
          cursor.fail("PARSE_EXPECTED_COLOR", `Expected character color but found "${token.value}".`, token.span);
        }
        color = token.value;
        break;
      }
      case "voice":
        voiceTag = cursor.expectString("voice tag");
        break;
      case "pos":
        pos = [cursor.expectNumber("x"), cursor.expectNumber("y")];
        break;
      case "anchor": {
        const words: string[] = [];
        while (cursor.peekType() === "word") {
          const word = cursor.expect("word", "anchor");
          if (!ANCHOR_WORDS.has(word.value)) {
            cursor.fail("PARSE_VOCABULARY", `anchor must be one of {${[...ANCHOR_WORDS].join(", ")}}; got "${word.value}".`, word.span);
          }
          words.push(word.value);
        }
        anchor = words.join(" ");
        break;
      }
      case "z":
        z = cursor.expectInt("z order");
        break;
      case "float":
        floatAmp = cursor.expectNumber("float amplitude");
        floatSpeed = cursor.expectNumber("float speed");
        break;
      case "sprite": {
        const expression = cursor.expectWord("sprite expression");
        sprites[expression] = cursor.expectString("sprite path");
        break;
      }
      default:
        cursor.fail("PARSE_UNKNOWN_FIELD", `Unknown character field "${fieldToken.value}".`, fieldToken.span);
    }
    cursor.endStatement();
  }
  closeBlock(cursor);
  emit(dropUndefined({
    kind: "characterDef",
    ident,
    displayName,
    color,
    voiceTag,
    pos,
    anchor,
    z,
    floatAmp,
    floatSpeed,
    sprites,
  }));
};

const parseAsk: StatementParser = ({ cursor, emit }) => {
  const prompt = cursor.expectString("choice prompt");
  let timeout: number | undefined;
  let timeoutDefault: number | undefined;
  if (cursor.accept("word", "timeout")) {
    timeout = cursor.expectNumber("choice timeout");
    if (!cursor.isWord("default")) {
      cursor.fail("PARSE_EXPECTED_WORD", "choice timeout needs a default option.");
    }
    cursor.expectKeyword("default");
    timeoutDefault = cursor.expectInt("default option");
  } else if (cursor.isWord("default")) {
    cursor.fail("PARSE_EXPECTED_WORD", "choice default needs a timeout.");
  }

  const options: ChoiceOption[] = [];
  for (;;) {
    const text = cursor.expectString("option text");
    cursor.expect("arrow", '"->"');
    const target = cursor.expectWord("option target");
    options.push({ text, target });
    if (cursor.peekType() === "string") {
      continue;
    }
    if (cursor.peekType() === "semi" && cursor.peekType(1) === "string" && cursor.peekType(2) === "arrow") {
      cursor.next();
      continue;
    }
    break;
  }
  if (timeoutDefault !== undefined && (timeoutDefault < 1 || timeoutDefault > options.length)) {
    cursor.fail("PARSE_RANGE", `choice default must be between 1 and ${options.length}.`);
  }
  cursor.endStatement();
  emit(dropUndefined({ kind: "choice", prompt, options, timeout, timeoutDefault }));
};

const parseCheck: StatementParser = (ctx) => {
  const { cursor, emit } = ctx;
  const name = cursor.expectWord("variable name");
  const opToken = cursor.expect("op", "comparison operator");
  const op = cursor.oneOf(opToken.value, COMPARE_OPS, "check operator", opToken.span);
  const value = parseOperand(cursor, "comparison value");

  if (cursor.peekType() === "lbrace") {
    ctx.session.checkCounter += 1;
    const skipLabel = `${CHECK_SKIP_PREFIX}${ctx.session.checkCounter}`;
    emit({ kind: "ifJump", name, op: invertOp(op), value, target: skipLabel });
    ctx.parseBody();
    emit({ kind: "label", name: skipLabel });
    return;
  }
  if (!cursor.accept("word", "go") && !cursor.accept("word", "goto")) {
    cursor.fail("PARSE_EXPECTED_WORD", 'check needs "go <label>" or a "{ ... }" body.');
  }
  const target = cursor.expectWord("jump target");
  cursor.endStatement();
  emit({ kind: "ifJump", name, op, value, target });
};

const parseLoading: StatementParser = (ctx) => {
  const text = ctx.cursor.expectString("loading text");
  ctx.emit({ kind: "loading", action: "start", text });
  ctx.parseBody();
  ctx.emit({ kind: "loading", action: "end" });
};

const parseCall: StatementParser = ({ cursor, emit, resolveScript }) => {
  const pathToken = cursor.expect("string", "script path");
  const label = cursor.expectWord("entry label");
  cursor.endStatement();
  emit({ kind: "call", path: pathToken.value, resolvedPath: resolveScript(pathToken.value), label });
};

export const BLOCK_STATEMENTS: Readonly<Record<string, StatementParser>> = {
  character: parseCharacter,
  ask: parseAsk,
  check: parseCheck,
  loading: parseLoading,
  call: parseCall,
};
