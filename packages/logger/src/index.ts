/**
 * @portbridge/logger
 *
 * Structured JSON logging with a correlation ID per invocation
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  correlationId: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Records below this level are dropped (default: "debug") */
  level?: LogLevel;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Partial<LogContext>): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  correlationId: string;
  message: string;
  [key: string]: unknown;
}

/**
 * Create a structured logger with correlation ID support
 */
export function createLogger(context: LogContext, options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "debug");

  const formatLog = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      correlationId: context.correlationId,
      message,
      ...Object.fromEntries(
        Object.entries(context).filter(([key]) => key !== "correlationId")
      ),
      ...meta,
    };
    return JSON.stringify(entry);
  };

  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(formatLog("debug", msg, meta));
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(formatLog("info", msg, meta));
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(formatLog("warn", msg, meta));
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(formatLog("error", msg, meta));
    },
    child: (childContext) =>
      createLogger(
        {
          ...context,
          ...childContext,
          correlationId: childContext.correlationId ?? context.correlationId,
        },
        options
      ),
  };
}

/**
 * Logger that drops everything. Used when a component is built without one.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Generate a unique correlation ID for one CLI run
 */
export function generateCorrelationId(): string {
  return `run_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}
