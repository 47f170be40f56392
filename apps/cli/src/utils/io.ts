import { readFile, writeFile } from "node:fs/promises";

import { CliError } from "./errors";

/** Name used for standard input in diagnostics. */
export const STDIN_NAME = "<stdin>";

export function isStdin(path: string | undefined): path is "-" | undefined {
  return path === undefined || path === "-";
}

/** Concatenate everything a stream yields. */
export async function readStream(
  stream: AsyncIterable<Uint8Array | string>
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Read the raw bytes of a file, or of stdin for `-` and no path. Decoding
 * is left to the parser so encoding errors carry a byte offset.
 */
export async function readInput(
  path: string | undefined,
  stdin: AsyncIterable<Uint8Array | string> = process.stdin
): Promise<Uint8Array> {
  if (isStdin(path)) {
    return await readStream(stdin);
  }
  try {
    return await readFile(path);
  } catch (error) {
    throw new CliError(`Cannot read ${path}: ${describe(error)}`);
  }
}

export async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content);
  } catch (error) {
    throw new CliError(`Cannot write ${path}: ${describe(error)}`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
