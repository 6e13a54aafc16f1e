/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Multiple output sinks (console, file), each with its own minimum level
 * - Runtime level adjustment
 * - Async sink initialization and release
 */

import { formatLogMessage, shouldLog } from './helpers';

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level
 * 2. Formatted with a level-appropriate tag and stamped with the clock
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level)
 * @param dependencies - External dependencies (clock, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   {
 *     clock: systemClock,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: fileSink, minLevel: LOG_LEVELS.DEBUG }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Structure downloaded");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const clock = dependencies.clock;
  const sinks: SinkWithLevel[] = dependencies.sinks || [];

  function log(level: LogLevel, msg: string) {
    if (!shouldLog(level, currentLevel)) {
      return;
    }

    const entry = {
      level: level,
      message: msg,
      formatted: formatLogMessage(level, msg, logLevels),
      time: clock()
    };

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(entry);
      } catch (err) {
        // Sink errors should not crash the logger
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel) {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize every sink that needs it, in order
   */
  async function initialize(): Promise<InitMessage[]> {
    const messages: InitMessage[] = [];

    for (const { sink } of sinks) {
      if (!sink.initialize) {
        continue;
      }
      try {
        messages.push(await sink.initialize());
      } catch (err) {
        messages.push({ success: false, message: err instanceof Error ? err.message : String(err) });
      }
    }

    return messages;
  }

  async function close(): Promise<void> {
    for (const { sink } of sinks) {
      if (sink.close) {
        await sink.close();
      }
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize,
    close: close
  };
}
