import type { Block, Document, Span } from "./model";

export interface BlockVisit {
  block: Block;
  /** Nesting depth: 0 for top-level blocks */
  depth: number;
}

/**
 * Visit every block in document order, parents before children.
 * List items are descended into; the items themselves are not visited.
 */
export function* walkBlocks(
  blocks: Document | readonly Block[],
  depth = 0
): Generator<BlockVisit> {
  const sequence = "blocks" in blocks ? blocks.blocks : blocks;
  for (const block of sequence) {
    yield { block, depth };
    switch (block.type) {
      case "paragraph":
      case "header":
        break;
      case "list":
        for (const item of block.items) {
          yield* walkBlocks(item, depth + 1);
        }
        break;
      case "blockquote":
        yield* walkBlocks(block.children, depth + 1);
        break;
    }
  }
}

/** Visit every span depth-first, parents before children. */
export function* walkSpans(spans: readonly Span[]): Generator<Span> {
  for (const span of spans) {
    yield span;
    if (span.type === "styled") {
      yield* walkSpans(span.children);
    }
  }
}

/** Every span of the document, block by block. */
export function* documentSpans(doc: Document): Generator<Span> {
  for (const { block } of walkBlocks(doc)) {
    if (block.type === "paragraph" || block.type === "header") {
      yield* walkSpans(block.spans);
    }
  }
}

/** Concatenated text of all Text leaves, ignoring styling. */
export function visibleText(spans: readonly Span[]): string {
  let result = "";
  for (const span of walkSpans(spans)) {
    if (span.type === "text") {
      result += span.text;
    }
  }
  return result;
}

const MAILTO = /^mailto:/i;

/**
 * Display form of a link target: surrounding whitespace trimmed and a
 * `mailto:` scheme dropped.
 */
export function normalizeHref(href: string): string {
  return href.trim().replace(MAILTO, "");
}

export function isMailto(href: string): boolean {
  return MAILTO.test(href.trim());
}
