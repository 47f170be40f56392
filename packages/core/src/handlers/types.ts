import type { Logger } from "@tdoc/shared";

import type { TdocConfig } from "../schema/config";

/**
 * Context passed to all tdoc handlers.
 * Transport-agnostic: the CLI (or any embedding program) provides it.
 */
export interface HandlerContext {
  /** tdoc configuration (loaded, not raw) */
  config: TdocConfig;
  /** Structured logger */
  logger: Logger;
}
