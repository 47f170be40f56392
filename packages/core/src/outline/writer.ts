import type { Result } from "neverthrow";

import type { Block, Document, ListItem, Span } from "../document/model";
import { normalizeHref, visibleText } from "../document/traverse";
import { collect, drain, type Emit, type SinkError, type TextSink } from "../sink";
import { codeSpan, escapeDestination, escapeOutline } from "./escape";

// ---------------------------------------------------------------------------
// Inline
// ---------------------------------------------------------------------------

function writeSpans(spans: readonly Span[]): string {
  return spans.map(writeSpan).join("");
}

function writeSpan(span: Span): string {
  if (span.type === "text") {
    return escapeOutline(span.text);
  }

  const inner = writeSpans(span.children);
  switch (span.style.kind) {
    case "bold":
      return `**${inner}**`;
    case "italic":
      return `_${inner}_`;
    case "underline":
      return `<u>${inner}</u>`;
    case "strike":
      return `<s>${inner}</s>`;
    case "highlight":
      return `<mark>${inner}</mark>`;
    case "code":
      return codeSpan(visibleText(span.children));
    case "link": {
      const label =
        visibleText(span.children).trim() === ""
          ? escapeOutline(normalizeHref(span.style.href))
          : inner;
      return `[${label}](${escapeDestination(span.style.href.trim())})`;
    }
  }
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

function isTextBlock(block: Block | undefined): boolean {
  return block?.type === "paragraph" || block?.type === "header";
}

function blockLines(block: Block): string[] {
  switch (block.type) {
    case "paragraph":
      return writeSpans(block.spans).split("\n");
    case "header": {
      const [first = "", ...rest] = writeSpans(block.spans).split("\n");
      return [`${"#".repeat(block.level)} ${first}`, ...rest];
    }
    case "blockquote":
      return separated(block.children).map((line) =>
        line ? `> ${line}` : ">"
      );
    case "list":
      return block.items.flatMap((item, index) =>
        itemLines(item, block.ordered ? `${index + 1}. ` : "- ")
      );
  }
}

/** Blocks separated by one blank line. */
function separated(blocks: readonly Block[]): string[] {
  return blocks.flatMap((block, index) =>
    index > 0 ? ["", ...blockLines(block)] : blockLines(block)
  );
}

function itemLines(item: ListItem, marker: string): string[] {
  const body: string[] = [];
  item.forEach((block, index) => {
    if (index > 0) {
      // Two text blocks in one item stay in one paragraph with a hard break
      if (isTextBlock(block) && isTextBlock(item[index - 1])) {
        const last = body.length - 1;
        body[last] = `${body[last] ?? ""}\\`;
      } else {
        body.push("");
      }
    }
    body.push(...blockLines(block));
  });

  // Continuation lines sit under the item's content column
  const continuation = " ".repeat(marker.length);
  const indented = body.map((line) => (line ? `${continuation}${line}` : ""));
  const [first] = body;
  if (first === undefined) {
    return [marker.trimEnd()];
  }
  if (item[0]?.type === "list") {
    return [marker.trimEnd(), ...indented];
  }
  return [`${marker}${first}`, ...indented.slice(1)];
}

function writeDocument(doc: Document, emit: Emit): void {
  doc.blocks.forEach((block, index) => {
    if (index > 0) {
      emit("\n");
    }
    for (const line of blockLines(block)) {
      emit(`${line}\n`);
    }
  });
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Write a document in the Markdown-like outline format.
 *
 * @example
 * toOutline(document(bulletList([paragraph("One")], [paragraph("Two")])));
 * // "- One\n- Two\n"
 */
export function writeOutline(
  doc: Document,
  sink: TextSink
): Result<void, SinkError> {
  return drain(sink, (emit) => writeDocument(doc, emit));
}

export function toOutline(doc: Document): string {
  return collect((emit) => writeDocument(doc, emit));
}
