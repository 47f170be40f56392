/**
 * Core types for the render module.
 */

export type LinkIndexFormat = "superscript" | "bracketed";

/**
 * Everything the terminal renderer needs to know about its output. Always
 * passed explicitly; there is no process-wide default.
 */
export interface FormattingStyle {
  /** ANSI escapes and OSC-8 hyperlinks when true, plain ASCII otherwise */
  ansi: boolean;
  /** Wrap column; 0 disables wrapping */
  width: number;
  linkIndexFormat: LinkIndexFormat;
}

/** Viewport dimensions for terminal-aware rendering */
export interface Viewport {
  width: number;
}

/**
 * Zero-width control sequence that opens a region (SGR style or OSC-8
 * link) together with the sequence that closes it.
 */
export interface Control {
  open: string;
  close: string;
}

/** Inline content flattened for line layout. */
export type Fragment =
  | { kind: "text"; text: string }
  | { kind: "open"; control: Control }
  | { kind: "close" };
