import { err, ok, type Result } from "neverthrow";

import type {
  Block,
  Document,
  HeaderLevel,
  ListItem,
  Span,
  SpanStyle,
} from "../document/model";
import { ParseError, parseError } from "./errors";
import { isWhitespace, Scanner, type TextChunk, type Token } from "./scanner";

// ---------------------------------------------------------------------------
// Tag table
// ---------------------------------------------------------------------------

type LeafTag = "p" | "h1" | "h2" | "h3";
type InlineTag = "b" | "i" | "u" | "s" | "mark" | "code" | "a";

type TagClass =
  | { kind: "leaf"; tag: LeafTag }
  | { kind: "list"; tag: "ul" | "ol" }
  | { kind: "blockquote"; tag: "blockquote" }
  | { kind: "item"; tag: "li" }
  | { kind: "inline"; tag: InlineTag };

const HEADER_LEVELS: Record<Exclude<LeafTag, "p">, HeaderLevel> = {
  h1: 1,
  h2: 2,
  h3: 3,
};

const INLINE_STYLES: Record<Exclude<InlineTag, "a">, SpanStyle> = {
  b: { kind: "bold" },
  i: { kind: "italic" },
  u: { kind: "underline" },
  s: { kind: "strike" },
  mark: { kind: "highlight" },
  code: { kind: "code" },
};

function classify(name: string): TagClass | undefined {
  switch (name) {
    case "p":
    case "h1":
    case "h2":
    case "h3":
      return { kind: "leaf", tag: name };
    case "ul":
    case "ol":
      return { kind: "list", tag: name };
    case "blockquote":
      return { kind: "blockquote", tag: name };
    case "li":
      return { kind: "item", tag: name };
    case "b":
    case "i":
    case "u":
    case "s":
    case "mark":
    case "code":
    case "a":
      return { kind: "inline", tag: name };
    default:
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Open-element stack
// ---------------------------------------------------------------------------

interface DraftText {
  type: "text";
  chunks: TextChunk[];
}

interface DraftStyled {
  type: "styled";
  style: SpanStyle;
  children: DraftSpan[];
}

type DraftSpan = DraftText | DraftStyled;

type Frame =
  | { kind: "root"; blocks: Block[] }
  | { kind: "blockquote"; tag: "blockquote"; offset: number; blocks: Block[] }
  | { kind: "item"; tag: "li"; offset: number; blocks: Block[] }
  | { kind: "list"; tag: "ul" | "ol"; offset: number; items: ListItem[] }
  | { kind: "leaf"; tag: LeafTag; offset: number; spans: DraftSpan[] }
  | {
      kind: "inline";
      tag: InlineTag;
      style: SpanStyle;
      offset: number;
      spans: DraftSpan[];
    };

type RootFrame = Extract<Frame, { kind: "root" }>;
type OpenFrame = Exclude<Frame, { kind: "root" }>;

class TreeBuilder {
  private readonly root: RootFrame = { kind: "root", blocks: [] };
  private readonly open: OpenFrame[] = [];

  constructor(private readonly source: string) {}

  build(): Document {
    const scanner = new Scanner(this.source);
    for (let token = scanner.next(); token; token = scanner.next()) {
      this.accept(token);
    }

    const innermost = this.open.at(-1);
    if (innermost) {
      throw this.fail(
        "UnclosedElement",
        `<${innermost.tag}> is never closed`,
        innermost.offset
      );
    }
    return { blocks: this.root.blocks };
  }

  private get top(): Frame {
    return this.open.at(-1) ?? this.root;
  }

  private accept(token: Token): void {
    switch (token.kind) {
      case "start":
        this.openElement(token);
        break;
      case "end":
        this.closeElement(token);
        break;
      case "text":
        this.addText(token);
        break;
    }
  }

  // ---------------------------------------------------------------------------
  // Start tags
  // ---------------------------------------------------------------------------

  private openElement(token: Extract<Token, { kind: "start" }>): void {
    const tag = classify(token.name);
    if (!tag) {
      throw this.fail(
        "DisallowedElement",
        `<${token.name}> is not an allowed element`,
        token.offset
      );
    }

    const href = this.checkAttributes(token, tag);
    if (token.selfClosing) {
      throw this.fail(
        "UnexpectedToken",
        `Self-closing <${token.name}/> is not allowed`,
        token.offset
      );
    }

    this.checkPlacement(tag, token.offset);

    const { offset } = token;
    switch (tag.kind) {
      case "leaf":
        this.open.push({ kind: "leaf", tag: tag.tag, offset, spans: [] });
        break;
      case "list":
        this.open.push({ kind: "list", tag: tag.tag, offset, items: [] });
        break;
      case "blockquote":
        this.open.push({ kind: "blockquote", tag: tag.tag, offset, blocks: [] });
        break;
      case "item":
        this.open.push({ kind: "item", tag: tag.tag, offset, blocks: [] });
        break;
      case "inline": {
        const style: SpanStyle =
          tag.tag === "a"
            ? { kind: "link", href: href ?? "" }
            : INLINE_STYLES[tag.tag];
        this.open.push({
          kind: "inline",
          tag: tag.tag,
          style,
          offset,
          spans: [],
        });
        break;
      }
    }
  }

  /** Validates attributes and returns the href of an `a` tag. */
  private checkAttributes(
    token: Extract<Token, { kind: "start" }>,
    tag: TagClass
  ): string | undefined {
    let href: string | undefined;

    for (const attribute of token.attributes) {
      if (tag.tag !== "a" || attribute.name !== "href") {
        throw this.fail(
          "InvalidAttribute",
          `Attribute "${attribute.name}" is not allowed on <${token.name}>`,
          attribute.offset
        );
      }
      if (href !== undefined) {
        throw this.fail(
          "InvalidAttribute",
          "Duplicate href attribute",
          attribute.offset
        );
      }
      if (attribute.value === null) {
        throw this.fail(
          "InvalidAttribute",
          "The href attribute needs a value",
          attribute.offset
        );
      }
      href = attribute.value;
    }

    if (tag.tag === "a" && href === undefined) {
      throw this.fail(
        "InvalidAttribute",
        "<a> requires an href attribute",
        token.offset
      );
    }
    return href;
  }

  private checkPlacement(tag: TagClass, offset: number): void {
    const parent = this.top;

    switch (tag.kind) {
      case "leaf":
      case "list":
      case "blockquote":
        if (parent.kind === "list") {
          throw this.fail(
            "DisallowedElement",
            `<${tag.tag}> must be wrapped in <li> inside <${parent.tag}>`,
            offset
          );
        }
        if (parent.kind === "leaf" || parent.kind === "inline") {
          throw this.fail(
            "DisallowedElement",
            `Block element <${tag.tag}> is not allowed inside <${parent.tag}>`,
            offset
          );
        }
        return;
      case "item":
        if (parent.kind !== "list") {
          throw this.fail(
            "DisallowedElement",
            "<li> is only allowed inside <ul> or <ol>",
            offset
          );
        }
        return;
      case "inline":
        if (parent.kind !== "leaf" && parent.kind !== "inline") {
          throw this.fail(
            "DisallowedElement",
            `Inline element <${tag.tag}> is not allowed at block position`,
            offset
          );
        }
        if (tag.tag === "a" && this.open.some((frame) => frame.tag === "a")) {
          throw this.fail("DisallowedElement", "Links cannot be nested", offset);
        }
        return;
    }
  }

  // ---------------------------------------------------------------------------
  // End tags
  // ---------------------------------------------------------------------------

  private closeElement(token: Extract<Token, { kind: "end" }>): void {
    if (!classify(token.name)) {
      throw this.fail(
        "DisallowedElement",
        `</${token.name}> is not an allowed element`,
        token.offset
      );
    }

    const frame = this.open.at(-1);
    if (frame?.tag === token.name) {
      this.open.pop();
      this.finish(frame);
      return;
    }

    if (frame && this.open.some((candidate) => candidate.tag === token.name)) {
      throw this.fail(
        "UnclosedElement",
        `<${frame.tag}> must be closed before </${token.name}>`,
        token.offset
      );
    }
    throw this.fail(
      "UnexpectedToken",
      `</${token.name}> does not close an open element`,
      token.offset
    );
  }

  private finish(frame: OpenFrame): void {
    switch (frame.kind) {
      case "leaf": {
        const spans = finishSpans(frame.spans);
        this.addBlock(
          frame.tag === "p"
            ? { type: "paragraph", spans }
            : { type: "header", level: HEADER_LEVELS[frame.tag], spans }
        );
        return;
      }
      case "list":
        this.addBlock({
          type: "list",
          ordered: frame.tag === "ol",
          items: frame.items,
        });
        return;
      case "blockquote":
        this.addBlock({ type: "blockquote", children: frame.blocks });
        return;
      case "item": {
        const parent = this.top;
        if (parent.kind === "list") {
          parent.items.push(frame.blocks);
        }
        return;
      }
      case "inline": {
        const parent = this.top;
        if (parent.kind === "leaf" || parent.kind === "inline") {
          parent.spans.push({
            type: "styled",
            style: frame.style,
            children: frame.spans,
          });
        }
        return;
      }
    }
  }

  private addBlock(block: Block): void {
    const parent = this.top;
    if (
      parent.kind === "root" ||
      parent.kind === "blockquote" ||
      parent.kind === "item"
    ) {
      parent.blocks.push(block);
    }
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  private addText(token: Extract<Token, { kind: "text" }>): void {
    const parent = this.top;
    if (parent.kind === "leaf" || parent.kind === "inline") {
      parent.spans.push({ type: "text", chunks: token.chunks });
      return;
    }

    const blank = token.chunks.every(
      (chunk) => !chunk.reference && [...chunk.text].every(isWhitespace)
    );
    if (blank) {
      return;
    }

    let offset = token.offset;
    while (isWhitespace(this.source.charAt(offset))) {
      offset += 1;
    }
    throw this.fail(
      "UnexpectedToken",
      "Text is only allowed inside <p>, <h1>, <h2> or <h3>",
      offset
    );
  }

  private fail(
    kind: ParseError["kind"],
    detail: string,
    offset: number
  ): ParseError {
    return parseError(this.source, kind, detail, offset);
  }
}

// ---------------------------------------------------------------------------
// Whitespace normalization
// ---------------------------------------------------------------------------

const LEADING_WHITESPACE = /^[ \t\n\r\f]+/;
const TRAILING_WHITESPACE = /[ \t\n\r\f]+$/;
const WHITESPACE_RUN = /[ \t\n\r\f]+/g;

/**
 * Trim literal whitespace from the start of a block's text. Stops at the
 * first visible character, character reference or code span.
 */
function trimStart(spans: DraftSpan[]): boolean {
  for (const span of spans) {
    if (span.type === "styled") {
      if (span.style.kind === "code" || trimStart(span.children)) {
        return true;
      }
      continue;
    }
    for (const chunk of span.chunks) {
      if (chunk.reference) {
        return true;
      }
      chunk.text = chunk.text.replace(LEADING_WHITESPACE, "");
      if (chunk.text) {
        return true;
      }
    }
  }
  return false;
}

function trimEnd(spans: DraftSpan[]): boolean {
  for (const span of [...spans].reverse()) {
    if (span.type === "styled") {
      if (span.style.kind === "code" || trimEnd(span.children)) {
        return true;
      }
      continue;
    }
    for (const chunk of [...span.chunks].reverse()) {
      if (chunk.reference) {
        return true;
      }
      chunk.text = chunk.text.replace(TRAILING_WHITESPACE, "");
      if (chunk.text) {
        return true;
      }
    }
  }
  return false;
}

function toSpans(drafts: DraftSpan[], verbatim: boolean): Span[] {
  const spans: Span[] = [];
  for (const draft of drafts) {
    if (draft.type === "styled") {
      spans.push({
        type: "styled",
        style: draft.style,
        children: toSpans(
          draft.children,
          verbatim || draft.style.kind === "code"
        ),
      });
      continue;
    }

    const value = draft.chunks
      .map((chunk) =>
        chunk.reference || verbatim
          ? chunk.text
          : chunk.text.replace(WHITESPACE_RUN, " ")
      )
      .join("");
    if (value) {
      spans.push({ type: "text", text: value });
    }
  }
  return spans;
}

function finishSpans(drafts: DraftSpan[]): Span[] {
  trimStart(drafts);
  trimEnd(drafts);
  return toSpans(drafts, false);
}

// ---------------------------------------------------------------------------
// Input decoding
// ---------------------------------------------------------------------------

/** Offset of the first byte that is not part of valid UTF-8, or -1. */
function findInvalidUtf8(bytes: Uint8Array): number {
  let index = 0;
  while (index < bytes.length) {
    const lead = bytes[index] ?? 0;
    if (lead < 0x80) {
      index += 1;
      continue;
    }

    let trailing: number;
    let minimum: number;
    if (lead >= 0xc2 && lead <= 0xdf) {
      trailing = 1;
      minimum = 0x80;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      trailing = 2;
      minimum = 0x800;
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      trailing = 3;
      minimum = 0x10000;
    } else {
      return index;
    }

    let codePoint = lead & (0x3f >> trailing);
    for (let k = 1; k <= trailing; k += 1) {
      const byte = bytes[index + k];
      if (byte === undefined || (byte & 0xc0) !== 0x80) {
        return index;
      }
      codePoint = (codePoint << 6) | (byte & 0x3f);
    }
    if (
      codePoint < minimum ||
      codePoint > 0x10ffff ||
      (codePoint >= 0xd800 && codePoint <= 0xdfff)
    ) {
      return index;
    }
    index += trailing + 1;
  }
  return -1;
}

function decode(input: string | Uint8Array): Result<string, ParseError> {
  if (typeof input === "string") {
    return ok(input);
  }

  const invalid = findInvalidUtf8(input);
  if (invalid >= 0) {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < invalid; i += 1) {
      if (input[i] === 0x0a) {
        line += 1;
        lineStart = i + 1;
      }
    }
    return err(
      new ParseError("EncodingError", "Input is not valid UTF-8", {
        offset: invalid,
        line,
        column: invalid - lineStart + 1,
      })
    );
  }
  return ok(new TextDecoder().decode(input));
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Parse FTML into a Document.
 *
 * Strict: the first violation of the tag subset ends the parse with a
 * ParseError carrying its position.
 *
 * @example
 * const result = parse("<p>Hello <b>world</b>!</p>");
 * if (result.isOk()) {
 *   console.log(result.value.blocks.length); // 1
 * }
 */
export function parse(
  input: string | Uint8Array
): Result<Document, ParseError> {
  return decode(input).andThen((source): Result<Document, ParseError> => {
    try {
      return ok(new TreeBuilder(source).build());
    } catch (error) {
      if (error instanceof ParseError) {
        return err(error);
      }
      throw error;
    }
  });
}
