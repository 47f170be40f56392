/**
 * Raw ANSI escape sequences for styled terminal output.
 */

import type { SpanStyle } from "../document/model";
import type { Control } from "./types";

const ESC = "\u001B[";
const OSC = "\u001B]";
const ST = "\u001B\\";

function sgr(on: number, off: number): Control {
  return { open: `${ESC}${on}m`, close: `${ESC}${off}m` };
}

/** SGR pairs per style; each closes only its own attribute. */
export const SGR = {
  bold: sgr(1, 22),
  italic: sgr(3, 23),
  underline: sgr(4, 24),
  strike: sgr(9, 29),
  highlight: sgr(7, 27),
  code: sgr(36, 39),
} as const satisfies Record<Exclude<SpanStyle["kind"], "link">, Control>;

const URI_CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]/g;

/** OSC-8 hyperlink region; control characters in the target are percent-encoded. */
export function hyperlink(href: string): Control {
  const target = href.replace(URI_CONTROL_CHARS, (char) =>
    encodeURIComponent(char)
  );
  return { open: `${OSC}8;;${target}${ST}`, close: `${OSC}8;;${ST}` };
}

const ESCAPE_SEQUENCE = /\u001B\[[0-9;]*m|\u001B\]8;;.*?\u001B\\/g;

/** Remove SGR and OSC-8 sequences. */
export function stripAnsi(value: string): string {
  return value.replace(ESCAPE_SEQUENCE, "");
}
