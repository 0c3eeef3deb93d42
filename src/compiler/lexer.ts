import { VnScriptError } from "../core/errors.js";
import type { SourcePosition, SourceSpan } from "../core/types.js";

export type TokenType =
  | "word"
  | "string"
  | "number"
  | "color"
  | "arrow"
  | "op"
  | "semi"
  | "colon"
  | "lbrace"
  | "rbrace";

export interface Token {
  type: TokenType;
  /** Raw text for words, ops and numbers; unescaped content for strings. */
  value: string;
  span: SourceSpan;
}

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  n: "\n",
  t: "\t",
};

const HEX_LENGTHS = new Set([3, 4, 6, 8]);

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= "0" && ch <= "9";
const isWordStart = (ch: string | undefined): boolean =>
  ch !== undefined && /[A-Za-z_$]/.test(ch);
const isWordPart = (ch: string | undefined): boolean =>
  ch !== undefined && /[A-Za-z0-9_.]/.test(ch);
const isHex = (ch: string | undefined): boolean => ch !== undefined && /[0-9A-Fa-f]/.test(ch);
const isBlank = (ch: string | undefined): boolean =>
  ch === undefined || ch === " " || ch === "\t" || ch === "\r" || ch === "\n";

/**
 * Splits script text into tokens. `//` always starts a line comment; `#` does
 * only when followed by whitespace or the end of input, so `#ff0000` stays a
 * color literal.
 */
export const tokenize = (source: string, filePath?: string): Token[] => {
  const tokens: Token[] = [];
  let offset = 0;
  let line = 1;
  let column = 1;

  const position = (): SourcePosition => ({ line, column });
  const fail = (code: string, message: string, start: SourcePosition): never => {
    throw new VnScriptError(code, message, { start, end: position() }, filePath);
  };
  const advance = (): string => {
    const ch = source[offset];
    offset += 1;
    if (ch === "\n") {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    return ch;
  };
  const skipLine = (): void => {
    while (offset < source.length && source[offset] !== "\n") {
      advance();
    }
  };
  const push = (type: TokenType, value: string, start: SourcePosition): void => {
    tokens.push({ type, value, span: { start, end: position() } });
  };

  while (offset < source.length) {
    const ch = source[offset];
    const next = source[offset + 1];
    const start = position();

    if (isBlank(ch)) {
      advance();
      continue;
    }
    if (ch === "/" && next === "/") {
      skipLine();
      continue;
    }
    if (ch === "#") {
      if (isBlank(next)) {
        skipLine();
        continue;
      }
      let hex = "";
      advance();
      while (isHex(source[offset])) {
        hex += advance();
      }
      if (!HEX_LENGTHS.has(hex.length) || isWordPart(source[offset])) {
        fail("PARSE_BAD_COLOR", `Invalid color literal "#${hex}${source[offset] ?? ""}".`, start);
      }
      push("color", `#${hex}`, start);
      continue;
    }
    if (ch === '"') {
      advance();
      let value = "";
      let closed = false;
      while (offset < source.length) {
        const current = advance();
        if (current === '"') {
          closed = true;
          break;
        }
        if (current === "\\") {
          const escaped = source[offset];
          const mapped = escaped === undefined ? undefined : ESCAPES[escaped];
          if (mapped === undefined) {
            fail("PARSE_BAD_ESCAPE", `Unknown escape sequence "\\${escaped ?? ""}".`, start);
          } else {
            advance();
            value += mapped;
          }
          continue;
        }
        if (current === "\n") {
          fail("PARSE_UNTERMINATED_STRING", "String literal is not closed before end of line.", start);
        }
        value += current;
      }
      if (!closed) {
        fail("PARSE_UNTERMINATED_STRING", "String literal is not closed before end of input.", start);
      }
      push("string", value, start);
      continue;
    }
    if (ch === "-" && next === ">") {
      advance();
      advance();
      push("arrow", "->", start);
      continue;
    }
    if (
      isDigit(ch) ||
      ((ch === "-" || ch === "+" || ch === ".") && (isDigit(next) || (next === "." && isDigit(source[offset + 2]))))
    ) {
      let text = "";
      if (ch === "-" || ch === "+") {
        text += advance();
      }
      while (isDigit(source[offset])) {
        text += advance();
      }
      if (source[offset] === "." && isDigit(source[offset + 1])) {
        text += advance();
        while (isDigit(source[offset])) {
          text += advance();
        }
      }
      if (isWordStart(source[offset])) {
        fail("PARSE_BAD_NUMBER", `Invalid number literal "${text}${source[offset]}".`, start);
      }
      push("number", text, start);
      continue;
    }
    if (ch === ":" && next === ":" && isWordStart(source[offset + 2])) {
      let text = advance() + advance();
      while (isWordPart(source[offset])) {
        text += advance();
      }
      push("word", text, start);
      continue;
    }
    if (isWordStart(ch)) {
      let text = advance();
      while (isWordPart(source[offset])) {
        text += advance();
      }
      push("word", text, start);
      continue;
    }
    if ((ch === "=" || ch === "!") && next === "=") {
      push("op", advance() + advance(), start);
      continue;
    }
    if (ch === ">" || ch === "<") {
      let op = advance();
      if (source[offset] === "=") {
        op += advance();
      }
      push("op", op, start);
      continue;
    }
    if (ch === ";") {
      advance();
      push("semi", ";", start);
      continue;
    }
    if (ch === ":") {
      advance();
      push("colon", ":", start);
      continue;
    }
    if (ch === "{") {
      advance();
      push("lbrace", "{", start);
      continue;
    }
    if (ch === "}") {
      advance();
      push("rbrace", "}", start);
      continue;
    }
    fail("PARSE_UNEXPECTED_CHARACTER", `Unexpected character "${ch}".`, start);
  }

  return tokens;
};
