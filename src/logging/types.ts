/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, file)
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks, resolving with one message per sink that needed it */
  initialize(): Promise<InitMessage[]>;
  /** Flush and release all sinks */
  close(): Promise<void>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  /** The output sink */
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Wall clock, stamped on every entry */
  clock: () => Date;
  /** Array of sinks with their minimum levels */
  sinks: SinkWithLevel[];
}

/**
 * One message on its way to the sinks (already filtered by level)
 */
export interface LogEntry {
  level: LogLevel;
  /** Message as passed by the caller */
  message: string;
  /** Message with its level tag */
  formatted: string;
  time: Date;
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 */
export interface LogSink {
  /** Write one entry */
  write(entry: LogEntry): void;
  /** Optional initialization (e.g. open a file) */
  initialize?(): Promise<InitMessage>;
  /** Optional release of held resources */
  close?(): Promise<void>;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colour output by level */
  colors: boolean;
}

/**
 * File sink interface
 * Lines written before initialize() are held and flushed once the file is open
 */
export interface FileSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  /** Lines waiting for the file to open (for testing/monitoring) */
  getPendingCount(): number;
}

/**
 * File sink configuration
 */
export interface FileSinkConfig {
  /** Log file path; parent directories are created */
  path: string;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  /** Whether initialization succeeded */
  success: boolean;
  /** Human-readable status message */
  message: string;
}
