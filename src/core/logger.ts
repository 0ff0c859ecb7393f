/**
 * Leveled logger for diagnostics.
 *
 * Writes `[level] message` lines to stderr so that stdout only carries
 * search results and model output.
 *
 * @module core/logger
 */

/** Numeric log level constants. Lower = more verbose. */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
} as const;

export type LogLevelValue = (typeof LogLevel)[keyof typeof LogLevel];

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /**
   * Minimum level to emit.
   * @default LogLevel.INFO, or LogLevel.DEBUG when BBSEARCH_DEBUG=1
   */
  level?: LogLevelValue;
}

function resolveLevel(options?: LoggerOptions): LogLevelValue {
  if (options?.level !== undefined) return options.level;
  if (process.env.BBSEARCH_DEBUG === "1") return LogLevel.DEBUG;
  return LogLevel.INFO;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((a) => (typeof a === "string" ? a : JSON.stringify(a) ?? String(a)))
    .join(" ");
}

function write(level: string, msg: string, args: unknown[]): void {
  const extra = args.length > 0 ? ` ${formatArgs(args)}` : "";
  process.stderr.write(`[${level}] ${msg}${extra}\n`);
}

/**
 * Create a logger writing to stderr.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const minLevel = resolveLevel(options);

  return {
    debug(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.DEBUG) write("debug", msg, args);
    },
    info(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.INFO) write("info", msg, args);
    },
    warn(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.WARN) write("warn", msg, args);
    },
    error(msg: string, ...args: unknown[]): void {
      if (minLevel <= LogLevel.ERROR) write("error", msg, args);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
