import { err, ok, type Result } from "neverthrow";

import type { Document } from "../document/model";
import { documentSpans, walkBlocks } from "../document/traverse";
import type { ParseError } from "../markup/errors";
import { parse } from "../markup/parser";
import { writeGemini } from "../gemini/writer";
import { writeMarkup } from "../markup/writer";
import { writeOutline } from "../outline/writer";
import { renderTerminal } from "../render/terminal";
import type { FormattingStyle } from "../render/types";
import type { OutputFormat } from "../schema/config";
import type { SinkError, TextSink } from "../sink";
import type { HandlerContext } from "./types";

// =============================================================================
// Types
// =============================================================================

/** Input parameters for the convert handler. */
export interface ConvertInput {
  /** FTML source */
  source: string | Uint8Array;
  /** Name shown in log lines (file path or "stdin") */
  name?: string;
  format: OutputFormat;
  /** Used by the terminal and text formats */
  style: FormattingStyle;
  sink: TextSink;
}

/** Summary of a finished conversion. */
export interface ConvertOutput {
  format: OutputFormat;
  /** Blocks at every nesting level */
  blocks: number;
  /** Link spans */
  links: number;
}

export type ConvertError = ParseError | SinkError;

// =============================================================================
// Helpers
// =============================================================================

function countBlocks(doc: Document): number {
  return [...walkBlocks(doc)].length;
}

function countLinks(doc: Document): number {
  let count = 0;
  for (const span of documentSpans(doc)) {
    if (span.type === "styled" && span.style.kind === "link") {
      count += 1;
    }
  }
  return count;
}

/** Write a parsed document in the requested format. */
export function writeDocument(
  doc: Document,
  format: OutputFormat,
  style: FormattingStyle,
  sink: TextSink
): Result<void, SinkError> {
  switch (format) {
    case "ftml":
      return writeMarkup(doc, sink);
    case "markdown":
      return writeOutline(doc, sink);
    case "gemini":
      return writeGemini(doc, sink);
    case "terminal":
      return renderTerminal(doc, style, sink);
    case "text":
      return renderTerminal(doc, { ...style, ansi: false }, sink);
  }
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Parse FTML and write it in another format.
 *
 * @returns Counts for the converted document, or the parse / sink error
 */
export async function convertHandler(
  input: ConvertInput,
  ctx: HandlerContext
): Promise<Result<ConvertOutput, ConvertError>> {
  const logger = ctx.logger.child({ source: input.name ?? "input" });

  const parsed = parse(input.source);
  if (parsed.isErr()) {
    logger.debug("Parse failed", {
      kind: parsed.error.kind,
      offset: parsed.error.offset,
    });
    return err(parsed.error);
  }

  const doc = parsed.value;
  const output: ConvertOutput = {
    format: input.format,
    blocks: countBlocks(doc),
    links: countLinks(doc),
  };
  logger.debug("Parsed document", {
    blocks: output.blocks,
    links: output.links,
  });

  const written = writeDocument(doc, input.format, input.style, input.sink);
  if (written.isErr()) {
    return err(written.error);
  }
  logger.debug("Wrote document", { format: input.format });
  return ok(output);
}
