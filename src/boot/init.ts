/**
 * Startup wiring: configuration check, logger sinks and controller client
 */

import { loadConfig } from './config';
import { MiniserverClient } from '@controller';
import { createConsoleSink, createFileSink, createLogger, LOG_LEVELS } from '@logging';
import { systemClock } from '@utils/time';
import { validateConfig } from '@validation';

import type { ConsoleAPI, SinkWithLevel } from '@logging';
import type { FetchFunction } from '@controller';
import type { ValidationResult } from '@validation';
import type { AppConfig, Runtime } from './types';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Configuration plus the combined parse and range check
 */
export interface ResolvedConfig {
  config: AppConfig;
  validation: ValidationResult;
}

/**
 * Read and validate configuration from an environment map
 */
export function resolveConfig(env: Env): ResolvedConfig {
  const loaded = loadConfig(env);
  const checked = validateConfig(loaded.config);
  const errors = loaded.errors.concat(checked.errors);

  return {
    config: loaded.config,
    validation: {
      valid: errors.length === 0,
      errors: errors,
      warnings: checked.warnings
    }
  };
}

/**
 * Optional overrides for the runtime's collaborators
 */
export interface RuntimeOptions {
  /** Console the console sink writes to */
  console?: ConsoleAPI;
  /** Colour console output */
  colors?: boolean;
  /** Fetch used by the controller client */
  fetch?: FetchFunction;
}

/**
 * Build the logger and controller client for a validated configuration
 *
 * The console sink follows the configured level. The file sink, when
 * enabled, records everything from DEBUG up. A file sink that fails to open
 * is reported as a warning and the run continues on the console.
 */
export async function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const sinks: SinkWithLevel[] = [
    {
      sink: createConsoleSink(options.console ?? console, { colors: options.colors ?? false }),
      minLevel: config.logLevel
    }
  ];

  if (config.logToFile) {
    sinks.push({ sink: createFileSink({ path: config.logFilePath }), minLevel: LOG_LEVELS.DEBUG });
  }

  const logger = createLogger(
    { level: config.logToFile ? LOG_LEVELS.DEBUG : config.logLevel },
    { clock: systemClock, sinks: sinks },
    LOG_LEVELS
  );

  const initMessages = await logger.initialize();
  for (const message of initMessages) {
    if (message.success) {
      logger.debug(message.message);
    } else {
      logger.warning('Log file unavailable: ' + message.message);
    }
  }

  const client = new MiniserverClient(
    {
      host: config.host,
      port: config.port,
      auth: { user: config.user, password: config.password },
      structureTimeoutMs: config.structureTimeoutMs,
      stateTimeoutMs: config.stateTimeoutMs
    },
    options.fetch
  );

  logger.debug('Controller at ' + client.baseUrl + ' as ' + config.user);

  return {
    config: config,
    logger: logger,
    client: client,
    initMessages: initMessages
  };
}
