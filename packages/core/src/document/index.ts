export type {
  Block,
  Blockquote,
  Document,
  DocumentImporter,
  Header,
  HeaderLevel,
  List,
  ListItem,
  Paragraph,
  Span,
  SpanStyle,
  SpanStyleKind,
  StyledSpan,
  TextSpan,
} from "./model";

export {
  blockquote,
  bold,
  bulletList,
  code,
  document,
  header,
  highlight,
  italic,
  link,
  list,
  listItem,
  orderedList,
  paragraph,
  strike,
  styled,
  text,
  underline,
  type SpanInput,
} from "./builders";

export {
  documentSpans,
  isMailto,
  normalizeHref,
  visibleText,
  walkBlocks,
  walkSpans,
  type BlockVisit,
} from "./traverse";
