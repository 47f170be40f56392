export type ParseErrorKind =
  | "UnexpectedToken"
  | "UnclosedElement"
  | "DisallowedElement"
  | "InvalidAttribute"
  | "EncodingError";

export interface SourcePosition {
  /**
   * Zero-based offset: UTF-16 code units for text input, bytes for
   * undecodable input
   */
  offset: number;
  /** One-based */
  line: number;
  /** One-based, in UTF-16 code units */
  column: number;
}

/**
 * The single error a failed parse produces. Parsing stops at the first
 * violation; no partial document accompanies it.
 */
export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  /** Message without the position suffix */
  readonly detail: string;
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(kind: ParseErrorKind, detail: string, position: SourcePosition) {
    super(`${detail} at line ${position.line}, column ${position.column}`);
    this.name = "ParseError";
    this.kind = kind;
    this.detail = detail;
    this.offset = position.offset;
    this.line = position.line;
    this.column = position.column;
  }
}

/** Line and column of a UTF-16 code unit offset. */
export function locate(source: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i += 1) {
    if (source.charCodeAt(i) === 0x0a) {
      line += 1;
      lineStart = i + 1;
    }
  }
  return { offset, line, column: offset - lineStart + 1 };
}

export function parseError(
  source: string,
  kind: ParseErrorKind,
  detail: string,
  offset: number
): ParseError {
  return new ParseError(kind, detail, locate(source, offset));
}
