import { createLogger, type Logger, type LogLevel } from "@tdoc/shared";

import { writeErrorLine } from "./output";

export function createCliLogger(level: LogLevel): Logger {
  return createLogger({ level, name: "tdoc", write: writeErrorLine });
}
