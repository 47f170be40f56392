import type { FormattingStyle, LinkIndexFormat } from "./render/types";
import { detectViewport } from "./render/viewport";
import type { TdocConfig } from "./schema/config";

/** What the caller knows about the output terminal. */
export interface TerminalInfo {
  isTTY: boolean;
  columns?: number;
  env?: NodeJS.ProcessEnv;
}

/** Per-invocation choices (command-line flags) that beat the config. */
export interface StyleOverrides {
  ansi?: boolean;
  width?: number;
  linkIndexFormat?: LinkIndexFormat;
}

/**
 * Determine if color should be used.
 * Respects NO_COLOR, FORCE_COLOR, and TERM=dumb conventions.
 */
export function shouldUseColor(terminal: TerminalInfo): boolean {
  const env = terminal.env ?? process.env;
  if (env.NO_COLOR) {
    return false;
  }
  if (env.FORCE_COLOR) {
    return true;
  }
  if (env.TERM === "dumb") {
    return false;
  }
  return terminal.isTTY;
}

/**
 * Build the FormattingStyle for one render from config, terminal facts and
 * flags. Flags win over config; config wins over detection.
 */
export function resolveFormattingStyle(
  config: TdocConfig,
  terminal: TerminalInfo,
  overrides: StyleOverrides = {}
): FormattingStyle {
  const { color, width, link_index_format } = config.render;

  let ansi = overrides.ansi;
  if (ansi === undefined) {
    ansi = color === "auto" ? shouldUseColor(terminal) : color === "always";
  }

  return {
    ansi,
    width: overrides.width ?? width ?? detectViewport(terminal).width,
    linkIndexFormat: overrides.linkIndexFormat ?? link_index_format,
  };
}
