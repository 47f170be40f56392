export { matchReference, escapeAttribute, escapeText } from "./entities";
export {
  ParseError,
  locate,
  type ParseErrorKind,
  type SourcePosition,
} from "./errors";
export { parse } from "./parser";
export { Scanner, type Attribute, type TextChunk, type Token } from "./scanner";
export { toMarkup, writeMarkup } from "./writer";
