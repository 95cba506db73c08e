import { vi } from "vitest";
import type { Mock } from "vitest";

import type { LogContext, Logger, LogLevel } from "@veilprint/core";

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

type LogMethod = (message: string, context?: LogContext) => void;

/**
 * Logger whose methods are vitest spies and which keeps every entry in
 * order, for asserting on what a component reported.
 */
export interface RecordingLogger extends Logger {
  readonly entries: LogEntry[];
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  /** Messages logged at `level`, in order. */
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const method = (level: LogLevel) =>
    vi.fn<LogMethod>((message, context) => {
      entries.push(context === undefined ? { level, message } : { level, message, context });
    });

  return {
    entries,
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
  };
}
