/**
 * Glyphs used by the terminal renderer, in an ANSI (Unicode) and a plain
 * ASCII variant.
 */

export interface GlyphSet {
  bullet: string;
  quote: string;
  /** Underline characters for H2 and H3 */
  underline: { 2: string; 3: string };
}

export const UNICODE_GLYPHS: GlyphSet = {
  bullet: "•",
  quote: "│",
  underline: { 2: "═", 3: "─" },
};

export const ASCII_GLYPHS: GlyphSet = {
  bullet: "*",
  quote: "|",
  underline: { 2: "=", 3: "-" },
};

export function glyphsFor(ansi: boolean): GlyphSet {
  return ansi ? UNICODE_GLYPHS : ASCII_GLYPHS;
}

const SUPERSCRIPT_DIGITS = "⁰¹²³⁴⁵⁶⁷⁸⁹";

/** Superscript numeral, e.g. 12 → "¹²". */
export function superscript(value: number): string {
  return [...String(value)]
    .map((digit) => SUPERSCRIPT_DIGITS.charAt(Number(digit)))
    .join("");
}
