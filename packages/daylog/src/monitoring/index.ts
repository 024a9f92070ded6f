export { Logger, getLogger } from './logger';
export type { LogContext, LogLevel, LogEntry, LogSink, LoggerOptions } from './logger';
