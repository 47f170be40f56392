import type { Result } from "neverthrow";

import type { Block, Document, Header, Span } from "../document/model";
import { collect, drain, type Emit, type SinkError, type TextSink } from "../sink";
import { SGR, stripAnsi } from "./ansi";
import { glyphsFor, type GlyphSet } from "./glyphs";
import { footnoteLabel, inlineFragments, LinkRegistry } from "./inline";
import {
  displayWidth,
  layoutFragments,
  padStart,
  replaceControls,
} from "./text";
import type { FormattingStyle, Fragment } from "./types";
import { DEFAULT_WIDTH } from "./viewport";

/**
 * One render call. Holds the footnote registry, so an instance is never
 * reused across documents.
 */
class TerminalRenderer {
  private readonly links = new LinkRegistry();
  private readonly glyphs: GlyphSet;

  constructor(private readonly style: FormattingStyle) {
    this.glyphs = glyphsFor(style.ansi);
  }

  render(doc: Document, emit: Emit): void {
    let wrote = false;
    for (const block of doc.blocks) {
      const lines = this.block(block, "", "");
      if (lines.length === 0) {
        continue;
      }
      if (wrote) {
        emit("\n");
      }
      for (const line of lines) {
        emit(`${line}\n`);
      }
      wrote = true;
    }

    if (this.links.size === 0) {
      return;
    }
    const footnotes = this.links.footnotes().map(({ index, href }) => ({
      label: footnoteLabel(index, this.style.linkIndexFormat),
      href,
    }));
    const labelWidth = Math.max(
      ...footnotes.map(({ label }) => displayWidth(label))
    );
    emit("\n");
    const restPrefix = " ".repeat(labelWidth + 1);
    for (const { label, href } of footnotes) {
      const lines = layoutFragments(
        [{ kind: "text", text: replaceControls(href) }],
        {
          width: this.style.width,
          firstPrefix: `${padStart(label, labelWidth)} `,
          restPrefix,
        }
      );
      for (const line of lines) {
        emit(`${line}\n`);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  private block(block: Block, first: string, rest: string): string[] {
    switch (block.type) {
      case "paragraph":
        return this.text(block.spans, first, rest);
      case "header":
        return this.header(block, first, rest);
      case "list": {
        if (block.items.length === 0) {
          return [];
        }
        return block.items.flatMap((item, index) => {
          const marker = block.ordered
            ? `${padStart(String(index + 1), 2)}. `
            : ` ${this.glyphs.bullet} `;
          const itemFirst = (index === 0 ? first : rest) + marker;
          const itemRest = rest + " ".repeat(displayWidth(marker));
          if (item.length === 0) {
            return [itemFirst.trimEnd()];
          }
          return this.sequence(item, itemFirst, itemRest, false);
        });
      }
      case "blockquote": {
        const bar = `${this.glyphs.quote} `;
        if (block.children.length === 0) {
          return [(first + bar).trimEnd()];
        }
        return this.sequence(block.children, first + bar, rest + bar, true);
      }
    }
  }

  /** Sibling blocks; `spaced` puts a blank (prefix-only) line between them. */
  private sequence(
    blocks: readonly Block[],
    first: string,
    rest: string,
    spaced: boolean
  ): string[] {
    return blocks.flatMap((block, index) => {
      if (index === 0) {
        return this.block(block, first, rest);
      }
      const lines = this.block(block, rest, rest);
      return spaced ? [rest.trimEnd(), ...lines] : lines;
    });
  }

  private text(
    spans: readonly Span[],
    first: string,
    rest: string,
    wrap: (fragments: Fragment[]) => Fragment[] = (fragments) => fragments
  ): string[] {
    if (spans.length === 0) {
      return [first.trimEnd()];
    }
    const fragments = wrap(inlineFragments(spans, this.style, this.links));
    return layoutFragments(fragments, {
      width: this.style.width,
      firstPrefix: first,
      restPrefix: rest,
    });
  }

  private header(block: Header, first: string, rest: string): string[] {
    const bold = (fragments: Fragment[]): Fragment[] =>
      this.style.ansi
        ? [
            { kind: "open", control: SGR.bold },
            ...fragments,
            { kind: "close" },
          ]
        : fragments;
    const lines = this.text(block.spans, first, rest, bold);
    const { width } = this.style;

    if (block.level === 1) {
      const [line] = lines;
      if (lines.length !== 1 || line === undefined || width === 0) {
        return lines;
      }
      const prefixWidth = displayWidth(first);
      const textWidth = displayWidth(stripAnsi(line)) - prefixWidth;
      const pad = Math.floor((width - prefixWidth - textWidth) / 2);
      return pad > 0
        ? [first + " ".repeat(pad) + line.slice(first.length)]
        : lines;
    }

    const textWidth = Math.max(
      ...lines.map(
        (line, index) =>
          displayWidth(stripAnsi(line)) -
          displayWidth(index === 0 ? first : rest)
      )
    );
    if (textWidth <= 0) {
      return lines;
    }
    const rule = this.glyphs.underline[block.level].repeat(textWidth);
    return [...lines, rest + rule];
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Render a document for a terminal.
 *
 * In ANSI mode styles become SGR sequences and links OSC-8 hyperlinks. In
 * ASCII mode styles become plain markers and links get footnote indices
 * listed after the last block.
 */
export function renderTerminal(
  doc: Document,
  style: FormattingStyle,
  sink: TextSink
): Result<void, SinkError> {
  return drain(sink, (emit) => new TerminalRenderer(style).render(doc, emit));
}

export function toTerminal(doc: Document, style: FormattingStyle): string {
  return collect((emit) => new TerminalRenderer(style).render(doc, emit));
}

/** Fill in unspecified style fields: ASCII, 80 columns, superscript indices. */
export function formattingStyle(
  overrides: Partial<FormattingStyle> = {}
): FormattingStyle {
  return {
    ansi: overrides.ansi ?? false,
    width: overrides.width ?? DEFAULT_WIDTH,
    linkIndexFormat: overrides.linkIndexFormat ?? "superscript",
  };
}
