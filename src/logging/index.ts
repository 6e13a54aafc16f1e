/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with level colours (createConsoleSink)
 * - Append-only file sink (createFileSink)
 * - Pure filter, format and parse functions
 */

export { formatLogMessage, shouldLog, parseLogLevel, LOG_LEVELS } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink } from './file';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  LogEntry,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleAPI,
  ConsoleSinkConfig,
  FileSink,
  FileSinkConfig,
  InitMessage
} from './types';
