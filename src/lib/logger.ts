/**
 * Structured Logger
 *
 * Provides a consistent logging interface that outputs structured JSON in production
 * and human-readable logs in development.
 *
 * Usage:
 * ```typescript
 * import { logger } from "lenient-feed";
 *
 * logger.info("Feed parsed", { href: "https://example.com/feed.xml", entries: 12 });
 * logger.warn("Feed is malformed", { code: "xml_not_well_formed" });
 * ```
 */

/**
 * Log levels in order of severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Context data that can be attached to log entries.
 */
export type LogContext = Record<string, unknown>;

/**
 * A structured log entry.
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger configuration options.
 */
interface LoggerConfig {
  /** Minimum log level to output (default: LOG_LEVEL, else "info" in production, "debug" otherwise) */
  minLevel?: LogLevel;
  /** Whether to output JSON format (default: true in production, false in development) */
  json?: boolean;
  /** Service name for structured logs */
  service?: string;
}

/**
 * The methods shared by the root logger and its children.
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (additionalContext: LogContext) => Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isProduction = process.env.NODE_ENV === "production";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

function defaultMinLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return isProduction ? "info" : "debug";
}

/**
 * Creates a logger instance with the given configuration.
 */
function createLogger(config: LoggerConfig = {}): Logger {
  const { minLevel = defaultMinLevel(), json = isProduction, service = "lenient-feed" } = config;

  const minLevelPriority = LOG_LEVEL_PRIORITY[minLevel];

  /**
   * Formats a log entry for output.
   */
  function formatEntry(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({
        ...entry,
        service,
        ...(entry.context && { ...entry.context }),
      });
    }

    // Human-readable format for development
    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelColor = levelColors[entry.level];
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);

    let output = `${levelColor}${levelStr}${reset} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    return output;
  }

  /**
   * Logs a message at the given level.
   */
  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    const formatted = formatEntry(entry);

    switch (level) {
      case "debug":
      case "info":
        console.log(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  function bind(baseContext: LogContext | undefined): Logger {
    const withBase = (context?: LogContext): LogContext | undefined =>
      baseContext ? { ...baseContext, ...context } : context;

    return {
      /**
       * Logs a debug message (only shown in development by default).
       */
      debug: (message, context) => log("debug", message, withBase(context)),

      /**
       * Logs an info message.
       */
      info: (message, context) => log("info", message, withBase(context)),

      /**
       * Logs a warning message.
       */
      warn: (message, context) => log("warn", message, withBase(context)),

      /**
       * Logs an error message.
       */
      error: (message, context) => log("error", message, withBase(context)),

      /**
       * Creates a child logger with additional context.
       * Useful for adding invocation-specific context such as the source URL.
       */
      child: (additionalContext) => bind({ ...baseContext, ...additionalContext }),
    };
  }

  return bind(undefined);
}

/**
 * Default logger instance.
 */
export const logger = createLogger();

/**
 * Creates an invocation-scoped logger carrying the source being parsed.
 */
export function createParseLogger(context: { source: string; invocationId?: string }): Logger {
  return logger.child(context);
}

export { createLogger };
