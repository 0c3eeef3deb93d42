import { VnScriptError } from "../core/errors.js";
import type { SourceSpan } from "../core/types.js";
import type { Token, TokenType } from "./lexer.js";

const describe = (token: Token | undefined): string => {
  if (!token) {
    return "end of input";
  }
  return token.type === "string" ? `string "${token.value}"` : `"${token.value}"`;
};

export class TokenCursor {
  private position = 0;

  constructor(
    private readonly tokens: readonly Token[],
    readonly filePath: string
  ) {}

  get index(): number {
    return this.position;
  }

  atEnd(): boolean {
    return this.position >= this.tokens.length;
  }

  peek(offset = 0): Token | undefined {
    return this.tokens[this.position + offset];
  }

  peekType(offset = 0): TokenType | undefined {
    return this.peek(offset)?.type;
  }

  isWord(value?: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.type === "word" && (value === undefined || token.value === value);
  }

  spanHere(): SourceSpan {
    const token = this.peek() ?? this.tokens[this.tokens.length - 1];
    return token
      ? token.span
      : { start: { line: 1, column: 1 }, end: { line: 1, column: 1 } };
  }

  fail(code: string, message: string, span: SourceSpan = this.spanHere()): never {
    throw new VnScriptError(code, message, span, this.filePath);
  }

  next(): Token {
    const token = this.peek();
    if (!token) {
      return this.fail("PARSE_UNEXPECTED_EOF", "Unexpected end of input.");
    }
    this.position += 1;
    return token;
  }

  expect(type: TokenType, what: string): Token {
    const token = this.peek();
    if (!token || token.type !== type) {
      return this.fail("PARSE_EXPECTED_" + type.toUpperCase(), `Expected ${what} but found ${describe(token)}.`);
    }
    this.position += 1;
    return token;
  }

  expectWord(what: string): string {
    return this.expect("word", what).value;
  }

  expectKeyword(value: string): void {
    if (!this.isWord(value)) {
      this.fail("PARSE_EXPECTED_WORD", `Expected "${value}" but found ${describe(this.peek())}.`);
    }
    this.position += 1;
  }

  expectString(what: string): string {
    return this.expect("string", what).value;
  }

  expectNumber(what: string): number {
    return Number(this.expect("number", what).value);
  }

  expectInt(what: string): number {
    const token = this.expect("number", what);
    const value = Number(token.value);
    if (!Number.isInteger(value)) {
      this.fail("PARSE_EXPECTED_INTEGER", `Expected integer ${what} but found "${token.value}".`, token.span);
    }
    return value;
  }

  /** Accepts a boolean literal spelled `true`/`false`. */
  expectBool(what: string): boolean {
    const token = this.peek();
    if (token?.type === "word" && (token.value === "true" || token.value === "false")) {
      this.position += 1;
      return token.value === "true";
    }
    return this.fail("PARSE_EXPECTED_BOOL", `Expected true or false for ${what} but found ${describe(token)}.`);
  }

  /** Consumes the token when it matches and reports whether it did. */
  accept(type: TokenType, value?: string): boolean {
    const token = this.peek();
    if (token?.type === type && (value === undefined || token.value === value)) {
      this.position += 1;
      return true;
    }
    return false;
  }

  endStatement(): void {
    this.expect("semi", '";"');
  }

  atStatementEnd(): boolean {
    const type = this.peekType();
    return type === undefined || type === "semi" || type === "rbrace";
  }

  /** Raises a vocabulary violation in the `<domain> must be one of a, b` form. */
  oneOf<T extends string>(value: string, allowed: readonly T[], domain: string, span?: SourceSpan): T {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      return this.fail(
        "PARSE_VOCABULARY",
        `${domain} must be one of {${allowed.join(", ")}}; got "${value}".`,
        span
      );
    }
    return match;
  }
}
