import { matchReference } from "./entities";
import { parseError, type ParseErrorKind } from "./errors";

/**
 * Piece of a text run. References are kept apart from literal text because
 * whitespace produced by a reference is never collapsed or trimmed.
 */
export interface TextChunk {
  text: string;
  reference: boolean;
}

export interface Attribute {
  name: string;
  /** null for a bare attribute without `=` */
  value: string | null;
  offset: number;
}

export type Token =
  | {
      kind: "start";
      name: string;
      attributes: Attribute[];
      selfClosing: boolean;
      offset: number;
    }
  | { kind: "end"; name: string; offset: number }
  | { kind: "text"; chunks: TextChunk[]; offset: number };

const WHITESPACE = new Set([" ", "\t", "\n", "\r", "\f"]);

export function isWhitespace(char: string): boolean {
  return WHITESPACE.has(char);
}

const NAME_START = /[A-Za-z]/;
const NAME_CHAR = /[A-Za-z0-9]/;
const ATTRIBUTE_STOP = new Set([..." \t\n\r\f", "/", ">", "=", '"', "'", "<"]);

/**
 * Single-pass tokenizer for the FTML tag subset.
 *
 * `next()` yields one token at a time and `reset()` moves the cursor, so a
 * scan can be resumed from any token boundary.
 */
export class Scanner {
  private position = 0;

  constructor(private readonly source: string) {}

  get offset(): number {
    return this.position;
  }

  reset(offset = 0): void {
    this.position = offset;
  }

  next(): Token | undefined {
    if (this.position >= this.source.length) {
      return undefined;
    }
    if (this.source[this.position] === "<") {
      return this.scanTag();
    }
    return this.scanText();
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  private scanText(): Token {
    const start = this.position;
    const chunks: TextChunk[] = [];
    let literal = "";

    while (this.position < this.source.length) {
      const char = this.source.charAt(this.position);
      if (char === "<") {
        break;
      }
      if (char === "&") {
        if (literal) {
          chunks.push({ text: literal, reference: false });
          literal = "";
        }
        chunks.push({ text: this.scanReference(), reference: true });
        continue;
      }
      literal += char;
      this.position += 1;
    }

    if (literal) {
      chunks.push({ text: literal, reference: false });
    }
    return { kind: "text", chunks, offset: start };
  }

  private scanReference(): string {
    const match = matchReference(this.source, this.position);
    if (!match.ok) {
      throw this.fail("EncodingError", match.reason, this.position);
    }
    this.position += match.length;
    return match.value;
  }

  // ---------------------------------------------------------------------------
  // Tags
  // ---------------------------------------------------------------------------

  private scanTag(): Token {
    const start = this.position;
    const after = this.source.charAt(start + 1);

    if (after === "/") {
      this.position = start + 2;
      const name = this.scanName();
      if (!name) {
        throw this.fail("UnexpectedToken", "Expected a tag name after </", start);
      }
      this.skipWhitespace();
      if (this.source[this.position] !== ">") {
        throw this.fail("UnexpectedToken", `Malformed end tag </${name}>`, start);
      }
      this.position += 1;
      return { kind: "end", name, offset: start };
    }

    if (!NAME_START.test(after)) {
      const what =
        after === "!" || after === "?"
          ? "Comments, doctypes and processing instructions are not allowed"
          : "Unescaped <";
      throw this.fail("UnexpectedToken", what, start);
    }

    this.position = start + 1;
    const name = this.scanName();
    const attributes: Attribute[] = [];

    for (;;) {
      const before = this.position;
      this.skipWhitespace();
      if (this.position >= this.source.length) {
        throw this.fail("UnexpectedToken", `Unterminated <${name}> tag`, start);
      }

      const char = this.source.charAt(this.position);
      if (char === ">") {
        this.position += 1;
        return { kind: "start", name, attributes, selfClosing: false, offset: start };
      }
      if (char === "/") {
        if (this.source[this.position + 1] !== ">") {
          throw this.fail("UnexpectedToken", "Unexpected / in tag", this.position);
        }
        this.position += 2;
        return { kind: "start", name, attributes, selfClosing: true, offset: start };
      }
      if (ATTRIBUTE_STOP.has(char) || this.position === before) {
        throw this.fail(
          "UnexpectedToken",
          `Unexpected ${JSON.stringify(char)} in <${name}> tag`,
          this.position
        );
      }
      attributes.push(this.scanAttribute(start, name));
    }
  }

  private scanAttribute(tagStart: number, tagName: string): Attribute {
    const offset = this.position;
    let name = "";
    while (
      this.position < this.source.length &&
      !ATTRIBUTE_STOP.has(this.source.charAt(this.position))
    ) {
      name += this.source.charAt(this.position);
      this.position += 1;
    }
    name = name.toLowerCase();

    const afterName = this.position;
    this.skipWhitespace();
    if (this.source[this.position] !== "=") {
      this.position = afterName;
      return { name, value: null, offset };
    }
    this.position += 1;
    this.skipWhitespace();

    const quote = this.source.charAt(this.position);
    if (quote !== '"' && quote !== "'") {
      throw this.fail(
        "InvalidAttribute",
        `Value of attribute "${name}" must be quoted`,
        offset
      );
    }
    this.position += 1;

    let value = "";
    for (;;) {
      if (this.position >= this.source.length) {
        throw this.fail("UnexpectedToken", `Unterminated <${tagName}> tag`, tagStart);
      }
      const char = this.source.charAt(this.position);
      if (char === quote) {
        this.position += 1;
        return { name, value, offset };
      }
      if (char === "&") {
        value += this.scanReference();
        continue;
      }
      value += char;
      this.position += 1;
    }
  }

  private scanName(): string {
    const start = this.position;
    if (!NAME_START.test(this.source.charAt(start))) {
      return "";
    }
    while (NAME_CHAR.test(this.source.charAt(this.position))) {
      this.position += 1;
    }
    return this.source.slice(start, this.position).toLowerCase();
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.source.charAt(this.position))) {
      this.position += 1;
    }
  }

  private fail(kind: ParseErrorKind, detail: string, offset: number) {
    return parseError(this.source, kind, detail, offset);
  }
}
