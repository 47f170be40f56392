import { LOG_LEVELS } from "@tdoc/shared";
import { z } from "zod";

export const OUTPUT_FORMATS = [
  "terminal",
  "ftml",
  "markdown",
  "gemini",
  "text",
] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Terminal rendering defaults.
 */
export const RenderConfigSchema = z.object({
  /** Wrap column; unset means the terminal width, 0 disables wrapping */
  width: z.number().int().nonnegative().optional(),
  /** ANSI styling: follow the terminal, or force on/off */
  color: z.enum(["auto", "always", "never"]).default("auto"),
  /** Footnote markers for links in ASCII output */
  link_index_format: z.enum(["superscript", "bracketed"]).default("superscript"),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;

/**
 * Output defaults.
 */
export const OutputConfigSchema = z.object({
  /** Format used by --output when the file extension says nothing */
  default_format: z.enum(OUTPUT_FORMATS).optional(),
});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

/**
 * tdoc configuration schema.
 * Stored in ~/.config/tdoc/config.toml (user) and .tdoc.toml (project)
 */
export const TdocConfigSchema = z.object({
  /** Rendering defaults */
  render: RenderConfigSchema.default({}),
  /** Output defaults */
  output: OutputConfigSchema.optional(),
  /** Minimum level for diagnostics on stderr */
  log_level: z.enum(LOG_LEVELS).default("warn"),
});

export type TdocConfig = z.infer<typeof TdocConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: TdocConfig = TdocConfigSchema.parse({});
