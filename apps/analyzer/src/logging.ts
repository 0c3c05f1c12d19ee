import type { LogContext, Logger } from "@proof-analyzer/ingestion";

import { LOG_LEVELS } from "./env";

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  environment?: string;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  // eslint-disable-next-line no-console
  console[level](line);
};

export function createLogger({
  level = "info",
  service = "proof-analyzer",
  environment = "development",
  sink = consoleSink,
}: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  function write(entryLevel: LogLevel, message: string, context?: LogContext) {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) return;

    const payload = {
      level: entryLevel,
      message,
      service,
      environment,
      timestamp: new Date().toISOString(),
      ...context,
    };

    sink(entryLevel, JSON.stringify(payload));
  }

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}
