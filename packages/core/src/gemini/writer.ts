import type { Result } from "neverthrow";

import type {
  Block,
  Document,
  HeaderLevel,
  ListItem,
  Span,
} from "../document/model";
import { normalizeHref, visibleText, walkSpans } from "../document/traverse";
import { escapeDestination } from "../outline/escape";
import { collect, drain, type Emit, type SinkError, type TextSink } from "../sink";

/**
 * Gemtext is line-oriented: every line has exactly one type, and there is
 * no inline markup, no nesting and no escaping.
 */
type GeminiLine =
  | { kind: "text"; text: string }
  | { kind: "heading"; level: HeaderLevel; text: string }
  | { kind: "item"; text: string }
  | { kind: "quote"; text: string }
  | { kind: "link"; href: string; label: string };

const BLANK: GeminiLine = { kind: "text", text: "" };
const QUOTE_BREAK: GeminiLine = { kind: "quote", text: "" };

function formatLine(line: GeminiLine): string {
  switch (line.kind) {
    case "text":
      return line.text;
    case "heading":
      return `${"#".repeat(line.level)} ${line.text}`;
    case "item":
      return `* ${line.text}`;
    case "quote":
      return line.text ? `> ${line.text}` : ">";
    case "link":
      return line.label ? `=> ${line.href} ${line.label}` : `=> ${line.href}`;
  }
}

// ---------------------------------------------------------------------------
// Inline
// ---------------------------------------------------------------------------

/** Styling is dropped; a link without visible text shows its target. */
function inlineText(spans: readonly Span[]): string {
  return spans
    .map((span) => {
      if (span.type === "text") {
        return span.text;
      }
      if (
        span.style.kind === "link" &&
        visibleText(span.children).trim() === ""
      ) {
        return normalizeHref(span.style.href);
      }
      return inlineText(span.children);
    })
    .join("");
}

function singleLine(text: string): string {
  return text.split(/\r?\n/).join(" ");
}

/** One link line per link span, in document order. */
function linkLines(spans: readonly Span[]): GeminiLine[] {
  const lines: GeminiLine[] = [];
  for (const span of walkSpans(spans)) {
    if (span.type === "styled" && span.style.kind === "link") {
      lines.push({
        kind: "link",
        href: escapeDestination(span.style.href.trim()),
        label: singleLine(visibleText(span.children)).trim(),
      });
    }
  }
  return lines;
}

function isLinkOnly(spans: readonly Span[]): boolean {
  const [first] = spans;
  return (
    spans.length === 1 &&
    first?.type === "styled" &&
    first.style.kind === "link"
  );
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

function quoted(line: GeminiLine): GeminiLine {
  if (line.kind === "link" || line.kind === "quote") {
    return line;
  }
  return { kind: "quote", text: formatLine(line) };
}

function itemLines(item: ListItem): GeminiLine[] {
  const texts: string[] = [];
  const links: GeminiLine[] = [];
  const nested: GeminiLine[] = [];
  for (const block of item) {
    if (block.type === "paragraph" || block.type === "header") {
      texts.push(singleLine(inlineText(block.spans)));
      links.push(...linkLines(block.spans));
    } else {
      nested.push(...blockLines(block));
    }
  }
  return [{ kind: "item", text: texts.join(" ") }, ...links, ...nested];
}

function blockLines(block: Block): GeminiLine[] {
  switch (block.type) {
    case "paragraph":
      if (isLinkOnly(block.spans)) {
        return linkLines(block.spans);
      }
      return [
        ...inlineText(block.spans)
          .split(/\r?\n/)
          .map((text): GeminiLine => ({ kind: "text", text })),
        ...linkLines(block.spans),
      ];
    case "header":
      return [
        {
          kind: "heading",
          level: block.level,
          text: singleLine(inlineText(block.spans)),
        },
        ...linkLines(block.spans),
      ];
    case "blockquote":
      return block.children
        .flatMap((child, index) =>
          index > 0 ? [QUOTE_BREAK, ...blockLines(child)] : blockLines(child)
        )
        .map(quoted);
    case "list":
      return block.items.flatMap(itemLines);
  }
}

function writeDocument(doc: Document, emit: Emit): void {
  const lines = doc.blocks.flatMap((block, index) =>
    index > 0 ? [BLANK, ...blockLines(block)] : blockLines(block)
  );
  for (const line of lines) {
    emit(`${formatLine(line)}\n`);
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Write a document as gemtext. Links also get a `=>` line of their own after
 * the line that mentions them; a paragraph that is a single link becomes just
 * that link line.
 *
 * @example
 * toGemini(document(paragraph(link("gemini://x.test", "home"))));
 * // "=> gemini://x.test home\n"
 */
export function writeGemini(
  doc: Document,
  sink: TextSink
): Result<void, SinkError> {
  return drain(sink, (emit) => writeDocument(doc, emit));
}

export function toGemini(doc: Document): string {
  return collect((emit) => writeDocument(doc, emit));
}
