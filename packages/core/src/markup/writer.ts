import type { Result } from "neverthrow";

import type { Block, Document, Span, SpanStyle } from "../document/model";
import { collect, drain, type Emit, type SinkError, type TextSink } from "../sink";
import { escapeAttribute, escapeText, numericReference } from "./entities";
import { isWhitespace } from "./scanner";

const INDENT = "  ";

const TAGS: Record<SpanStyle["kind"], string> = {
  bold: "b",
  italic: "i",
  underline: "u",
  strike: "s",
  highlight: "mark",
  code: "code",
  link: "a",
};

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

function writeDocument(doc: Document, emit: Emit): void {
  doc.blocks.forEach((block, index) => {
    if (index > 0) {
      emit("\n");
    }
    writeBlock(block, 0, emit);
  });
}

function writeBlock(block: Block, depth: number, emit: Emit): void {
  const indent = INDENT.repeat(depth);

  switch (block.type) {
    case "paragraph":
      emit(`${indent}<p>${writeSpans(block.spans)}</p>\n`);
      return;
    case "header": {
      const tag = `h${block.level}`;
      emit(`${indent}<${tag}>${writeSpans(block.spans)}</${tag}>\n`);
      return;
    }
    case "list": {
      const tag = block.ordered ? "ol" : "ul";
      emit(`${indent}<${tag}>\n`);
      for (const item of block.items) {
        emit(`${indent}${INDENT}<li>\n`);
        for (const child of item) {
          writeBlock(child, depth + 2, emit);
        }
        emit(`${indent}${INDENT}</li>\n`);
      }
      emit(`${indent}</${tag}>\n`);
      return;
    }
    case "blockquote":
      emit(`${indent}<blockquote>\n`);
      for (const child of block.children) {
        writeBlock(child, depth + 1, emit);
      }
      emit(`${indent}</blockquote>\n`);
      return;
  }
}

// ---------------------------------------------------------------------------
// Inline content
// ---------------------------------------------------------------------------

/**
 * Positions (in traversal order, code excluded) of the text leaves whose
 * leading or trailing whitespace the parser would trim. -1 when a code span
 * or nothing comes first.
 */
interface Edges {
  first: number;
  last: number;
}

function findEdges(spans: readonly Span[]): Edges {
  // null marks a code span: trimming never passes one
  const leaves: Array<{ index: number; empty: boolean } | null> = [];
  let count = 0;
  const visit = (list: readonly Span[]): void => {
    for (const span of list) {
      if (span.type === "text") {
        leaves.push({ index: count, empty: span.text === "" });
        count += 1;
      } else if (span.style.kind === "code") {
        leaves.push(null);
      } else {
        visit(span.children);
      }
    }
  };
  visit(spans);

  const pick = (ordered: typeof leaves): number => {
    const leaf = ordered.find((entry) => entry === null || !entry.empty);
    return leaf ? leaf.index : -1;
  };
  return { first: pick(leaves), last: pick([...leaves].reverse()) };
}

function writeSpans(spans: readonly Span[]): string {
  const edges = findEdges(spans);
  const cursor = { index: 0 };
  return spans.map((span) => writeSpan(span, edges, cursor, false)).join("");
}

function writeSpan(
  span: Span,
  edges: Edges,
  cursor: { index: number },
  verbatim: boolean
): string {
  if (span.type === "text") {
    if (verbatim) {
      return escapeText(span.text);
    }
    const index = cursor.index;
    cursor.index += 1;
    return encodeText(span.text, index === edges.first, index === edges.last);
  }

  const tag = TAGS[span.style.kind];
  const open =
    span.style.kind === "link"
      ? `<a href="${escapeAttribute(span.style.href)}">`
      : `<${tag}>`;
  const inner = span.children
    .map((child) =>
      writeSpan(child, edges, cursor, verbatim || span.style.kind === "code")
    )
    .join("");
  return `${open}${inner}</${tag}>`;
}

/**
 * Escape text so that parsing restores it exactly. Whitespace the parser
 * would collapse or trim is written as a numeric reference.
 */
function encodeText(value: string, leading: boolean, trailing: boolean): string {
  const chars = [...value];
  const isSpace = (char: string | undefined) =>
    char !== undefined && isWhitespace(char);

  let start = 0;
  if (leading) {
    while (start < chars.length && isSpace(chars[start])) {
      start += 1;
    }
  }
  let end = chars.length;
  if (trailing) {
    while (end > 0 && isSpace(chars[end - 1])) {
      end -= 1;
    }
  }

  let out = "";
  chars.forEach((char, i) => {
    if (!isWhitespace(char)) {
      out += escapeText(char);
    } else if (
      i >= start &&
      i < end &&
      char === " " &&
      !isSpace(chars[i - 1]) &&
      !isSpace(chars[i + 1])
    ) {
      out += char;
    } else {
      out += numericReference(char);
    }
  });
  return out;
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Write the canonical FTML form of a document.
 *
 * Structurally equal documents always produce identical output, and
 * parsing the output yields the document back.
 */
export function writeMarkup(
  doc: Document,
  sink: TextSink
): Result<void, SinkError> {
  return drain(sink, (emit) => writeDocument(doc, emit));
}

/** Canonical FTML as a string. */
export function toMarkup(doc: Document): string {
  return collect((emit) => writeDocument(doc, emit));
}
