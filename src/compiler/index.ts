export { tokenize, type Token, type TokenType } from "./lexer.js";
export { TokenCursor } from "./cursor.js";
export {
  ANCHOR_WORDS,
  EASE_KINDS,
  TRANSITION_STYLES,
  VIDEO_FITS,
  type ParseSession,
} from "./grammar.js";
export { CHECK_SKIP_PREFIX, invertOp } from "./blocks.js";
export {
  RESERVED_TARGETS,
  collectTargets,
  fsSourceReader,
  mapTargets,
  parseScript,
  parseScriptSource,
  type ParseOptions,
  type ScriptSourceReader,
} from "./parser.js";
export { ScriptLoader, type ScriptLoaderOptions } from "./loader.js";
