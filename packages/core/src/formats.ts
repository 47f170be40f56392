import { extname } from "node:path";

import { OUTPUT_FORMATS, type OutputFormat } from "./schema/config";

const EXTENSIONS: Record<string, OutputFormat> = {
  ".ftml": "ftml",
  ".html": "ftml",
  ".htm": "ftml",
  ".md": "markdown",
  ".markdown": "markdown",
  ".gmi": "gemini",
  ".gemini": "gemini",
  ".txt": "text",
};

/** Output format implied by a file name, if any. */
export function detectFormat(path: string): OutputFormat | undefined {
  return EXTENSIONS[extname(path).toLowerCase()];
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
