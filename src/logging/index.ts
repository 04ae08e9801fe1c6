// Barrel exports for logging module

export type { LogSeverity, LogRecord, LogSink, NodeLoggerOptions } from './node-logger.js';
export { LOG_SEVERITIES, NodeLogger, formatLogRecord, consoleSink } from './node-logger.js';
