export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const satisfies readonly LogLevel[];

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

type LogMethod = (message: string, metadata?: Record<string, unknown>) => void;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Minimum log level to output. Default: "info" */
  level?: LogLevel;
  /** Component name printed after the level */
  name?: string;
  /** Context to include in all log messages */
  context?: Record<string, unknown>;
  /** Line writer. Default: console.error, so stdout stays document-only */
  write?: (line: string) => void;
  /** Suppress all output (for testing). Default: false */
  silent?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function shouldLog(current: LogLevel, minimum: LogLevel): boolean {
  return LEVEL_ORDER[current] >= LEVEL_ORDER[minimum];
}

function formatMessage(
  level: LogLevel,
  name: string | undefined,
  message: string,
  metadata: Record<string, unknown> | undefined,
  context: Record<string, unknown>
): string {
  const merged = metadata ? { ...context, ...metadata } : context;
  const hasContext = Object.keys(merged).length > 0;
  const head = name ? `[${level}] ${name}: ${message}` : `[${level}] ${message}`;

  if (hasContext) {
    return `${head} ${JSON.stringify(merged)}`;
  }
  return head;
}

/**
 * Create a leveled Logger.
 *
 * Writes one line per message to stderr. Supports child loggers with
 * inherited context.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? "info";
  const context = options.context ?? {};
  const silent = options.silent ?? false;
  const write = options.write ?? ((line: string) => console.error(line));
  const { name } = options;

  function log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>
  ): void {
    if (silent || !shouldLog(level, minLevel)) {
      return;
    }
    write(formatMessage(level, name, message, metadata, context));
  }

  return {
    trace: (message, metadata) => log("trace", message, metadata),
    debug: (message, metadata) => log("debug", message, metadata),
    info: (message, metadata) => log("info", message, metadata),
    warn: (message, metadata) => log("warn", message, metadata),
    error: (message, metadata) => log("error", message, metadata),
    fatal: (message, metadata) => log("fatal", message, metadata),
    child(childContext) {
      return createLogger({
        level: minLevel,
        context: { ...context, ...childContext },
        silent,
        write,
        name,
      });
    },
  };
}

/** A no-op logger that discards all messages. Useful for tests. */
export const silentLogger: Logger = createLogger({ silent: true });
