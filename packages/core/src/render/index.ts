/**
 * Terminal rendering.
 *
 * Provides:
 * - renderTerminal / toTerminal: Document → ANSI or ASCII text
 * - layout helpers: word wrapping with zero-width control sequences
 * - viewport detection for picking a wrap width
 */

// Types
export type {
  Control,
  FormattingStyle,
  Fragment,
  LinkIndexFormat,
  Viewport,
} from "./types";

// ANSI sequences
export { hyperlink, SGR, stripAnsi } from "./ansi";

// Glyphs
export {
  ASCII_GLYPHS,
  glyphsFor,
  superscript,
  UNICODE_GLYPHS,
  type GlyphSet,
} from "./glyphs";

// Inline content
export {
  footnoteLabel,
  inlineFragments,
  LinkRegistry,
  type Footnote,
} from "./inline";

// Layout
export {
  displayWidth,
  layoutFragments,
  padStart,
  replaceControls,
  type LayoutOptions,
} from "./text";

// Viewport
export { DEFAULT_WIDTH, detectViewport } from "./viewport";

// Renderer
export { formattingStyle, renderTerminal, toTerminal } from "./terminal";
