/**
 * Structured logger.
 * JSON lines in production (for CI log collectors), readable lines otherwise.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const IS_PRODUCTION = process.env.NODE_ENV === "production";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Minimum level that gets printed. Tests run quiet unless LOG_LEVEL says otherwise.
 */
function resolveThreshold(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  if (process.env.NODE_ENV === "test") {
    return "error";
  }
  return IS_PRODUCTION ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveThreshold()];
}

function formatLog(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  } else {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
  }
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (enabled("debug")) {
      console.debug(formatLog("debug", message, meta));
    }
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (enabled("info")) {
      console.log(formatLog("info", message, meta));
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (enabled("warn")) {
      console.warn(formatLog("warn", message, meta));
    }
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (enabled("error")) {
      console.error(formatLog("error", message, meta));
    }
  },
};
