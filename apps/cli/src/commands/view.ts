/**
 * Root command: read FTML and show it in the terminal, or convert it.
 *
 * Usage:
 *   tdoc page.ftml               - render to the terminal
 *   cat page.ftml | tdoc         - read stdin
 *   tdoc page.ftml -o page.md    - convert, format from the extension
 *   tdoc page.ftml -t ftml       - canonical FTML on stdout
 *   tdoc page.ftml -t gemini     - gemtext on stdout
 */

import {
  convertHandler,
  detectFormat,
  isOutputFormat,
  loadConfig,
  ParseError,
  resolveFormattingStyle,
  streamSink,
  StringSink,
  type OutputFormat,
  type TdocConfig,
  type TerminalInfo,
  type TextSink,
} from "@tdoc/core";
import type { Logger } from "@tdoc/shared";
import { InvalidArgumentError } from "commander";

import { c } from "../utils/color";
import { CliError } from "../utils/errors";
import { isStdin, readInput, STDIN_NAME, writeOutput } from "../utils/io";
import { createCliLogger } from "../utils/logger";

export interface ViewOptions {
  ansi?: boolean;
  width?: number;
  bracketed?: boolean;
  output?: string;
  to?: string;
  verbose?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Option parsing
// ─────────────────────────────────────────────────────────────────────────────

export function parseWidth(value: string): number {
  const width = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(width)) {
    throw new InvalidArgumentError("Width must be a non-negative integer.");
  }
  return width;
}

/**
 * --to wins; a file output takes its format from the extension, then the
 * configured default, then plain text.
 */
export function resolveFormat(
  options: ViewOptions,
  config: TdocConfig
): OutputFormat {
  if (options.to !== undefined) {
    if (!isOutputFormat(options.to)) {
      throw new CliError(`Unknown output format: ${options.to}`);
    }
    return options.to;
  }
  if (options.output !== undefined) {
    return (
      detectFormat(options.output) ?? config.output?.default_format ?? "text"
    );
  }
  return "terminal";
}

export function formatParseError(name: string, error: ParseError): string {
  const location = `${name}:${error.line}:${error.column}`;
  return `${c.bold(location)}: ${c.red(error.kind)}: ${error.detail}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Action
// ─────────────────────────────────────────────────────────────────────────────

interface ViewContext {
  options: ViewOptions;
  config: TdocConfig;
  logger: Logger;
}

async function convert(
  source: Uint8Array,
  name: string,
  format: OutputFormat,
  sink: TextSink,
  { options, config, logger }: ViewContext
): Promise<void> {
  const toFile = options.output !== undefined;
  const terminal: TerminalInfo = toFile
    ? { isTTY: false }
    : { isTTY: process.stdout.isTTY ?? false, columns: process.stdout.columns };
  // Plain text only wraps when a width was asked for
  const width =
    options.width ??
    (format === "text" && config.render.width === undefined ? 0 : undefined);

  const style = resolveFormattingStyle(config, terminal, {
    ansi: options.ansi,
    width,
    linkIndexFormat: options.bracketed ? "bracketed" : undefined,
  });
  logger.debug("Formatting style", { format, ...style });

  const result = await convertHandler(
    { source, name, format, style, sink },
    { config, logger }
  );
  if (result.isErr()) {
    const error = result.error;
    if (error instanceof ParseError) {
      throw new CliError(formatParseError(name, error));
    }
    throw new CliError(`Cannot write output: ${error.message}`);
  }
}

export async function viewAction(
  input: string | undefined,
  options: ViewOptions
): Promise<void> {
  const config = await loadConfig({
    logger: createCliLogger(options.verbose ? "debug" : "warn"),
  });
  const logger = createCliLogger(options.verbose ? "debug" : config.log_level);
  const ctx: ViewContext = { options, config, logger };

  const source = await readInput(input);
  const name = isStdin(input) ? STDIN_NAME : input;
  const format = resolveFormat(options, config);

  if (options.output === undefined) {
    await convert(source, name, format, streamSink(process.stdout), ctx);
    return;
  }

  const buffer = new StringSink();
  await convert(source, name, format, buffer, ctx);
  await writeOutput(options.output, buffer.toString());
  logger.info("Wrote output", { path: options.output, format });
}
