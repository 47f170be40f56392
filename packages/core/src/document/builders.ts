import type {
  Block,
  Blockquote,
  Document,
  Header,
  HeaderLevel,
  List,
  ListItem,
  Paragraph,
  Span,
  SpanStyle,
  StyledSpan,
  TextSpan,
} from "./model";

/** Span children may be given as plain strings. */
export type SpanInput = Span | string;

function toSpans(inputs: readonly SpanInput[]): Span[] {
  return inputs.map((input) =>
    typeof input === "string" ? text(input) : input
  );
}

export function document(...blocks: Block[]): Document {
  return { blocks };
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

export function paragraph(...spans: SpanInput[]): Paragraph {
  return { type: "paragraph", spans: toSpans(spans) };
}

export function header(level: HeaderLevel, ...spans: SpanInput[]): Header {
  return { type: "header", level, spans: toSpans(spans) };
}

export function list(ordered: boolean, items: ListItem[]): List {
  return { type: "list", ordered, items };
}

export function bulletList(...items: ListItem[]): List {
  return list(false, items);
}

export function orderedList(...items: ListItem[]): List {
  return list(true, items);
}

export function listItem(...blocks: Block[]): ListItem {
  return blocks;
}

export function blockquote(...children: Block[]): Blockquote {
  return { type: "blockquote", children };
}

// ---------------------------------------------------------------------------
// Spans
// ---------------------------------------------------------------------------

export function text(value: string): TextSpan {
  return { type: "text", text: value };
}

export function styled(style: SpanStyle, ...children: SpanInput[]): StyledSpan {
  return { type: "styled", style, children: toSpans(children) };
}

export const bold = (...children: SpanInput[]): StyledSpan =>
  styled({ kind: "bold" }, ...children);

export const italic = (...children: SpanInput[]): StyledSpan =>
  styled({ kind: "italic" }, ...children);

export const underline = (...children: SpanInput[]): StyledSpan =>
  styled({ kind: "underline" }, ...children);

export const strike = (...children: SpanInput[]): StyledSpan =>
  styled({ kind: "strike" }, ...children);

export const highlight = (...children: SpanInput[]): StyledSpan =>
  styled({ kind: "highlight" }, ...children);

export const code = (...children: SpanInput[]): StyledSpan =>
  styled({ kind: "code" }, ...children);

export const link = (href: string, ...children: SpanInput[]): StyledSpan =>
  styled({ kind: "link", href }, ...children);
