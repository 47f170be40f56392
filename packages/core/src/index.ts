/**
 * tdoc Core Library
 *
 * Strict FTML parsing, canonical FTML and outline writers, and a terminal
 * renderer, all over one immutable document model.
 */

// Document model
export * from "./document";

// Sinks
export {
  collect,
  drain,
  StringSink,
  streamSink,
  type Emit,
  type SinkError,
  type TextSink,
} from "./sink";

// Markup (FTML)
export {
  escapeAttribute,
  escapeText,
  locate,
  matchReference,
  parse,
  ParseError,
  Scanner,
  toMarkup,
  writeMarkup,
  type Attribute,
  type ParseErrorKind,
  type SourcePosition,
  type TextChunk,
  type Token,
} from "./markup";

// Outline (Markdown-like)
export {
  codeSpan,
  escapeDestination,
  escapeOutline,
  toOutline,
  writeOutline,
} from "./outline";

// Gemtext
export { toGemini, writeGemini } from "./gemini";

// Terminal rendering
export * from "./render";

// Formatting style resolution
export {
  resolveFormattingStyle,
  shouldUseColor,
  type StyleOverrides,
  type TerminalInfo,
} from "./style";

// Formats
export { detectFormat, isOutputFormat } from "./formats";

// Config
export {
  applyEnvOverrides,
  findProjectConfigPath,
  getConfigPaths,
  getConfigValue,
  loadConfig,
  parseConfigText,
  serializeConfigObject,
  type ConfigPaths,
  type LoadConfigOptions,
} from "./config";
export { resolvePaths, type TdocPaths } from "./paths";

// Schema
export * from "./schema";

// Handlers
export * from "./handlers";
