/**
 * Centralized color handling using ansis with lazy initialization.
 *
 * ansis evaluates color support at module load time, but the environment
 * may change before the first diagnostic is printed (tests set NO_COLOR).
 * This module defers the color decision until first use.
 */
import { shouldUseColor } from "@tdoc/core";
import ansis, { Ansis } from "ansis";

let colorInstance: Ansis | null = null;

/**
 * Get the ansis instance, initializing on first access.
 */
export function getAnsis(): Ansis {
  if (colorInstance) {
    return colorInstance;
  }

  // Diagnostics go to stderr, so its terminal decides
  colorInstance = shouldUseColor({ isTTY: process.stderr.isTTY ?? false })
    ? ansis
    : new Ansis(0);
  return colorInstance;
}

/**
 * Reset the color instance (useful for testing).
 */
export function resetColorInstance(): void {
  colorInstance = null;
}

type ColorFn = (text: string) => string;

const createColorFn =
  (getter: (a: Ansis) => ColorFn): ColorFn =>
  (text: string) =>
    getter(getAnsis())(text);

export const c = {
  red: createColorFn((a) => a.red),
  bold: createColorFn((a) => a.bold),
} as const;
