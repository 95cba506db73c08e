export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

/**
 * Logging collaborator. Engine components never log through `console`
 * directly; they receive a Logger and report through it.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/** The subset of `console` a logger writes to. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface LoggerOptions {
  /** Minimum level that is written. Default: "info". */
  level?: LogLevel;
  /** Default: the global console. */
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Parse a level name (case-insensitive). Unknown or missing values fall
 * back to `fallback`.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Create a console-backed logger. Every line is prefixed with the scope,
 * e.g. `[veilprint:resolver] Rejected configuration`, and the context
 * object (if any) is passed through as a second argument.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? console;
  const prefix = `[veilprint:${scope}]`;

  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < threshold) return;
    if (context === undefined) {
      sink[level](`${prefix} ${message}`);
    } else {
      sink[level](`${prefix} ${message}`, context);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
