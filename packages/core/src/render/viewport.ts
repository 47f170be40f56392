/**
 * Viewport detection for terminal-aware rendering.
 */

import type { Viewport } from "./types";

export const DEFAULT_WIDTH = 80;
const MIN_WIDTH = 40;
const MAX_WIDTH = 200;

interface TerminalLike {
  columns?: number;
  isTTY?: boolean;
}

/**
 * Detect the viewport of a terminal stream (process.stdout by default).
 * Returns a sensible default if not in a TTY.
 */
export function detectViewport(
  stream: TerminalLike = process.stdout
): Viewport {
  const { columns } = stream;

  if (!columns || !stream.isTTY) {
    return { width: DEFAULT_WIDTH };
  }

  return { width: Math.max(MIN_WIDTH, Math.min(MAX_WIDTH, columns)) };
}
