import type { LogLevel, Logger, InitMessage } from '@logging';
import type { MiniserverClient } from '@controller';
import type { ValidationError } from '@validation';

/**
 * Runtime configuration, read from the environment (and .env)
 */
export interface AppConfig {
  /** Controller address (LOXONE_IP) */
  host: string;
  /** Controller HTTP port, null to use the default port 80 (LOXONE_PORT) */
  port: number | null;
  user: string;
  password: string;
  structureTimeoutMs: number;
  stateTimeoutMs: number;
  pollIntervalMs: number;
  /** Progress log every N passes, 0 disables */
  statsEvery: number;
  unassignedRoomLabel: string;
  logLevel: LogLevel;
  logToFile: boolean;
  logFilePath: string;
  /** Directory for monitor CSV files */
  outputDir: string;
  /** Path of the analysis JSON */
  analysisFile: string;
}

/**
 * Result of reading the environment. Values that could not be parsed keep
 * their default and are reported in `errors`.
 */
export interface ConfigLoadResult {
  config: AppConfig;
  errors: ValidationError[];
}

/**
 * Everything a command needs once configuration is accepted
 */
export interface Runtime {
  config: AppConfig;
  logger: Logger;
  client: MiniserverClient;
  /** Sink initialisation results (the file sink reports its path or failure) */
  initMessages: InitMessage[];
}
