/**
 * Console output sink
 *
 * Colours each line by level (debug grey, info cyan, warning yellow,
 * critical red) and routes warnings and criticals to stderr.
 */

import { Chalk } from 'chalk';

import { LOG_LEVELS } from '../helpers';

import type { ChalkInstance } from 'chalk';
import type { ConsoleAPI, ConsoleSinkConfig, LogEntry, LogLevel, LogSink } from '../types';

function paletteFor(chalk: ChalkInstance): Record<LogLevel, (text: string) => string> {
  return {
    0: chalk.gray,
    1: chalk.cyan,
    2: chalk.yellow,
    3: chalk.red
  };
}

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (colors)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: process.stdout.isTTY === true });
 * consoleSink.write(entry);
 * ```
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  const palette = paletteFor(new Chalk({ level: config.colors ? 1 : 0 }));

  function write(entry: LogEntry) {
    const line = palette[entry.level](entry.formatted);

    if (entry.level >= LOG_LEVELS.CRITICAL) {
      consoleApi.error(line);
    } else if (entry.level === LOG_LEVELS.WARNING) {
      consoleApi.warn(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
