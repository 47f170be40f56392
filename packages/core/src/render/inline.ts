import type { Span, SpanStyle } from "../document/model";
import { isMailto, normalizeHref, visibleText } from "../document/traverse";
import { hyperlink, SGR } from "./ansi";
import { superscript } from "./glyphs";
import { replaceControls } from "./text";
import type { FormattingStyle, Fragment, LinkIndexFormat } from "./types";

/** Plain-text stand-ins for styles in ASCII mode. */
const ASCII_MARKERS: Record<Exclude<SpanStyle["kind"], "link">, string> = {
  bold: "*",
  italic: "_",
  code: "`",
  strike: "~",
  underline: "",
  highlight: "",
};

export interface Footnote {
  index: number;
  href: string;
}

/**
 * Footnote indices for one render call. Each distinct href gets the next
 * 1-based index the first time it is seen.
 */
export class LinkRegistry {
  private readonly indices = new Map<string, number>();

  register(href: string): number {
    const existing = this.indices.get(href);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.indices.size + 1;
    this.indices.set(href, index);
    return index;
  }

  get size(): number {
    return this.indices.size;
  }

  footnotes(): Footnote[] {
    return [...this.indices].map(([href, index]) => ({ index, href }));
  }
}

export function footnoteLabel(index: number, format: LinkIndexFormat): string {
  return format === "superscript" ? superscript(index) : `[${index}]`;
}

/**
 * Flatten spans into layout fragments, registering footnotes for ASCII
 * links as they are met.
 */
export function inlineFragments(
  spans: readonly Span[],
  style: FormattingStyle,
  links: LinkRegistry
): Fragment[] {
  const fragments: Fragment[] = [];
  const visit = (list: readonly Span[]): void => {
    for (const span of list) {
      if (span.type === "text") {
        fragments.push({ kind: "text", text: replaceControls(span.text) });
        continue;
      }

      const { style: spanStyle, children } = span;
      if (spanStyle.kind === "link") {
        const href = spanStyle.href.trim();
        const shown = visibleText(children);
        const fallback =
          shown.trim() === "" ? replaceControls(normalizeHref(href)) : undefined;
        const content = (): void => {
          if (fallback === undefined) {
            visit(children);
          } else {
            fragments.push({ kind: "text", text: fallback });
          }
        };

        if (style.ansi) {
          fragments.push({ kind: "open", control: hyperlink(href) });
          content();
          fragments.push({ kind: "close" });
          continue;
        }

        content();
        const selfDescribing =
          isMailto(href) && normalizeHref(href) === (fallback ?? shown);
        if (!selfDescribing) {
          const label = footnoteLabel(
            links.register(href),
            style.linkIndexFormat
          );
          fragments.push({ kind: "text", text: label });
        }
        continue;
      }

      if (style.ansi) {
        fragments.push({ kind: "open", control: SGR[spanStyle.kind] });
        visit(children);
        fragments.push({ kind: "close" });
      } else {
        const marker = ASCII_MARKERS[spanStyle.kind];
        fragments.push({ kind: "text", text: marker });
        visit(children);
        fragments.push({ kind: "text", text: marker });
      }
    }
  };

  visit(spans);
  return fragments;
}
