/**
 * Document model.
 *
 * A Document owns a tree of blocks; blocks own spans. Everything is
 * readonly: documents are built once (by the parser or the builders) and
 * then only read.
 */

// ---------------------------------------------------------------------------
// Spans
// ---------------------------------------------------------------------------

export type SpanStyle =
  | { readonly kind: "bold" }
  | { readonly kind: "italic" }
  | { readonly kind: "underline" }
  | { readonly kind: "strike" }
  | { readonly kind: "highlight" }
  | { readonly kind: "code" }
  | { readonly kind: "link"; readonly href: string };

export type SpanStyleKind = SpanStyle["kind"];

export interface TextSpan {
  readonly type: "text";
  readonly text: string;
}

export interface StyledSpan {
  readonly type: "styled";
  readonly style: SpanStyle;
  readonly children: readonly Span[];
}

export type Span = TextSpan | StyledSpan;

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

export type HeaderLevel = 1 | 2 | 3;

export interface Paragraph {
  readonly type: "paragraph";
  readonly spans: readonly Span[];
}

export interface Header {
  readonly type: "header";
  readonly level: HeaderLevel;
  readonly spans: readonly Span[];
}

/** Blocks of one list entry, in order. */
export type ListItem = readonly Block[];

export interface List {
  readonly type: "list";
  readonly ordered: boolean;
  readonly items: readonly ListItem[];
}

export interface Blockquote {
  readonly type: "blockquote";
  readonly children: readonly Block[];
}

export type Block = Paragraph | Header | List | Blockquote;

export interface Document {
  readonly blocks: readonly Block[];
}

/**
 * Contract for importers that map foreign formats (general HTML) into a
 * Document. Importers are lenient where the FTML parser is strict.
 */
export interface DocumentImporter {
  readonly name: string;
  import(source: string): Document;
}
