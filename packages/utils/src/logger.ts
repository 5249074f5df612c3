/**
 * Leveled logger
 *
 * The level is taken from `setLevel()` when called, otherwise from the
 * `LOG_LEVEL` environment variable, otherwise INFO.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=WARN
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level are output.
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  log: (message: string, fields?: Record<string, unknown>) => void;
  info: (message: string, fields?: Record<string, unknown>) => void;
  debug: (message: string, fields?: Record<string, unknown>) => void;
  warn: (message: string, fields?: Record<string, unknown>) => void;
  error: (message: string, fields?: Record<string, unknown>) => void;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
};

const COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m", // Red
  [LogLevel.WARN]: "\x1b[33m", // Yellow
  [LogLevel.INFO]: "\x1b[36m", // Cyan
  [LogLevel.DEBUG]: "\x1b[32m", // Green
  [LogLevel.LOG]: null,
};

const RESET = "\x1b[0m";

let levelOverride: LogLevel | null = null;
let sink: LogSink | null = null;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const upper = value?.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper);
}

const getCurrentLogLevel = (): LogLevel => {
  return levelOverride ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];
};

const formatHeader = (level: LogLevel, scope: string | undefined): string => {
  const header = `[${new Date().toISOString()}] [${level}]${scope ? ` [${scope}]` : ""}`;
  const color = COLORS[level];
  return color === null ? header : `${color}${header}${RESET}`;
};

function toFields(fields: Record<string, unknown> | undefined): Record<string, string> | undefined {
  if (!fields) return undefined;

  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] =
      typeof value === "string" ? value
      : value instanceof Error ? value.message
      : JSON.stringify(value);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case LogLevel.ERROR:
      return console.error;
    case LogLevel.WARN:
      return console.warn;
    case LogLevel.INFO:
      return console.info;
    case LogLevel.DEBUG:
    case LogLevel.LOG:
      return console.log;
  }
}

function emit(level: LogLevel, scope: string | undefined, message: string, fields?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    scope,
    message,
    fields: toFields(fields),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  const write = consoleFor(level);
  if (record.fields) {
    write(formatHeader(level, scope), message, record.fields);
  } else {
    write(formatHeader(level, scope), message);
  }
}

function bind(scope: string | undefined): Logger {
  return {
    log: (message, fields) => emit(LogLevel.LOG, scope, message, fields),
    info: (message, fields) => emit(LogLevel.INFO, scope, message, fields),
    debug: (message, fields) => emit(LogLevel.DEBUG, scope, message, fields),
    warn: (message, fields) => emit(LogLevel.WARN, scope, message, fields),
    error: (message, fields) => emit(LogLevel.ERROR, scope, message, fields),
  };
}

/**
 * Logger whose records carry `scope` (shown as `[scope]` in the header)
 */
export function createScopedLogger(scope: string): Logger {
  return bind(scope);
}

export const logger = {
  ...bind(undefined),
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: (): LogLevel[] => Object.values(LogLevel),
  /**
   * Pin the level, ignoring LOG_LEVEL. Pass null to go back to the env.
   */
  setLevel: (level: LogLevel | null) => {
    levelOverride = level;
  },
  /**
   * Route records to a custom sink instead of the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};
