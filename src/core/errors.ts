import type { SourceSpan } from "./types.js";

export class VnScriptError extends Error {
  readonly code: string;
  readonly span?: SourceSpan;
  readonly filePath?: string;

  constructor(code: string, message: string, span?: SourceSpan, filePath?: string) {
    super(message);
    this.name = "VnScriptError";
    this.code = code;
    this.span = span;
    this.filePath = filePath;
  }
}

export const formatErrorLocation = (error: VnScriptError): string => {
  if (!error.span) {
    return error.filePath ?? "";
  }
  const where = `${error.span.start.line}:${error.span.start.column}`;
  return error.filePath ? `${error.filePath}:${where}` : where;
};
