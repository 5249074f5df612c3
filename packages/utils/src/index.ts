export { logger, createScopedLogger, parseLogLevel, LogLevel } from "./logger";
export type { Logger, LogRecord, LogSink } from "./logger";
