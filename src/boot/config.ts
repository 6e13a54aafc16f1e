/**
 * Configuration Management
 * Reads controller, monitor, logging and output settings from environment
 * variables, optionally loaded from a .env file
 */

import * as fs from 'fs';
import * as path from 'path';

import * as dotenv from 'dotenv';

import { LOG_LEVELS, parseLogLevel } from '@logging';
import { parseUnsignedInteger } from '@utils/number';

import type { LogLevel } from '@logging';
import type { ValidationError } from '@validation';
import type { AppConfig, ConfigLoadResult } from './types';

// ─────────────────────────────────────────────────────────────
// DEFAULTS
//   Values used when a variable is unset or blank.
// ─────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  // LOXONE_IP
  //   Role: Address of the Miniserver on the local network.
  //   Critical: IPv4 address or host name.
  host: '192.168.1.50',

  // LOXONE_PORT
  //   Role: HTTP port of the Miniserver web interface.
  //   Critical: 1-65535; leave empty (or 80) for the standard port.
  //   Recommended: Whatever the router forwards; Gen 2 units often sit behind a custom port.
  port: 8050,

  // LOXONE_USER / LOXONE_PASSWORD
  //   Role: Credentials for HTTP Basic auth.
  //   Critical: Non-empty user.
  //   Recommended: A dedicated read-only user, never the factory admin/admin.
  user: 'admin',
  password: 'admin',

  // STRUCTURE_TIMEOUT_MS
  //   Role: Timeout for downloading the structure file (LoxAPP3.json).
  //   Critical: 1-600000 ms.
  //   Recommended: 30000 ms; large installations produce multi-megabyte files.
  structureTimeoutMs: 30000,

  // STATE_TIMEOUT_MS
  //   Role: Timeout for one live-state read.
  //   Critical: 1-60000 ms.
  //   Recommended: 5000 ms.
  stateTimeoutMs: 5000,

  // POLL_INTERVAL_MS
  //   Role: Wait between sampling passes while monitoring.
  //   Critical: 100-60000 ms.
  //   Recommended: 500-10000 ms; 1000 ms catches switch presses without loading the controller.
  pollIntervalMs: 1000,

  // STATS_EVERY
  //   Role: Log a progress line every N sampling passes.
  //   Critical: 0 or more; 0 turns progress lines off.
  statsEvery: 100,

  // UNASSIGNED_ROOM_LABEL
  //   Role: Room name shown and recorded for controls without a room.
  unassignedRoomLabel: 'No room',

  // LOG_LEVEL
  //   Role: Minimum severity printed (debug, info, warning, critical).
  //   Recommended: info; debug also prints every baseline value.
  logLevel: LOG_LEVELS.INFO,

  // LOG_TO_FILE / LOG_FILE_PATH
  //   Role: Also append log lines to a file.
  //   Recommended: Enable for unattended runs.
  logToFile: false,
  logFilePath: 'logs/miniserver.log',

  // OUTPUT_DIR
  //   Role: Directory for monitor CSV files when no explicit file is given.
  outputDir: '.',

  // ANALYSIS_FILE
  //   Role: Where the analysis JSON is written.
  analysisFile: 'loxone_analysis.json',
};

/**
 * Environment variable read for each setting
 */
export const ENV_KEYS: Readonly<Record<keyof AppConfig, string>> = {
  host: 'LOXONE_IP',
  port: 'LOXONE_PORT',
  user: 'LOXONE_USER',
  password: 'LOXONE_PASSWORD',
  structureTimeoutMs: 'STRUCTURE_TIMEOUT_MS',
  stateTimeoutMs: 'STATE_TIMEOUT_MS',
  pollIntervalMs: 'POLL_INTERVAL_MS',
  statsEvery: 'STATS_EVERY',
  unassignedRoomLabel: 'UNASSIGNED_ROOM_LABEL',
  logLevel: 'LOG_LEVEL',
  logToFile: 'LOG_TO_FILE',
  logFilePath: 'LOG_FILE_PATH',
  outputDir: 'OUTPUT_DIR',
  analysisFile: 'ANALYSIS_FILE',
};

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Build the configuration from an environment map (pure)
 *
 * Blank variables fall back to DEFAULT_CONFIG. Numbers must be written as
 * plain digits; anything else is reported and the default kept.
 *
 * @example
 * ```typescript
 * const { config, errors } = loadConfig(process.env);
 * ```
 */
export function loadConfig(env: Env): ConfigLoadResult {
  const errors: ValidationError[] = [];

  function text(key: keyof AppConfig, fallback: string): string {
    const raw = env[ENV_KEYS[key]];
    return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
  }

  function integer(key: keyof AppConfig, fallback: number): number {
    const field = ENV_KEYS[key];
    const raw = env[field];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = parseUnsignedInteger(raw.trim());
    if (value === null) {
      errors.push({ level: 'CRITICAL', field: field, message: `${field} must be a whole number (got "${raw}")` });
      return fallback;
    }
    return value;
  }

  function port(): number | null {
    const raw = env[ENV_KEYS.port];
    if (raw !== undefined && raw.trim() === '') {
      return null;
    }
    return integer('port', DEFAULT_CONFIG.port ?? 80);
  }

  function logLevel(): LogLevel {
    const field = ENV_KEYS.logLevel;
    const raw = env[field];
    if (raw === undefined || raw.trim() === '') {
      return DEFAULT_CONFIG.logLevel;
    }
    const level = parseLogLevel(raw);
    if (level === null) {
      errors.push({
        level: 'CRITICAL',
        field: field,
        message: `${field} must be one of debug, info, warning, critical (got "${raw}")`
      });
      return DEFAULT_CONFIG.logLevel;
    }
    return level;
  }

  const config: AppConfig = {
    host: text('host', DEFAULT_CONFIG.host),
    port: port(),
    user: text('user', DEFAULT_CONFIG.user),
    // Taken verbatim, surrounding spaces included
    password: env[ENV_KEYS.password] ?? DEFAULT_CONFIG.password,
    structureTimeoutMs: integer('structureTimeoutMs', DEFAULT_CONFIG.structureTimeoutMs),
    stateTimeoutMs: integer('stateTimeoutMs', DEFAULT_CONFIG.stateTimeoutMs),
    pollIntervalMs: integer('pollIntervalMs', DEFAULT_CONFIG.pollIntervalMs),
    statsEvery: integer('statsEvery', DEFAULT_CONFIG.statsEvery),
    unassignedRoomLabel: text('unassignedRoomLabel', DEFAULT_CONFIG.unassignedRoomLabel),
    logLevel: logLevel(),
    logToFile: text('logToFile', 'false').toLowerCase() === 'true',
    logFilePath: text('logFilePath', DEFAULT_CONFIG.logFilePath),
    outputDir: text('outputDir', DEFAULT_CONFIG.outputDir),
    analysisFile: text('analysisFile', DEFAULT_CONFIG.analysisFile),
  };

  return { config, errors };
}

/**
 * Load a .env file into process.env
 *
 * Values in the file take precedence over variables already set.
 *
 * @returns true when the file was read, false when it does not exist
 */
export function loadEnvFile(envPath: string = path.resolve(process.cwd(), '.env')): boolean {
  if (!fs.existsSync(envPath)) {
    return false;
  }

  const result = dotenv.config({ path: envPath, override: true });
  if (result.error) {
    throw result.error;
  }
  return true;
}

const ENV_EXAMPLE = `# Miniserver connection
LOXONE_IP=192.168.1.50            # IP address or host name of the Miniserver
LOXONE_PORT=8050                  # HTTP port (leave empty for 80)
LOXONE_USER=admin
LOXONE_PASSWORD=change-me

# Timeouts (ms)
STRUCTURE_TIMEOUT_MS=30000        # Structure file download
STATE_TIMEOUT_MS=5000             # One state read

# Monitor
POLL_INTERVAL_MS=1000             # Wait between sampling passes
STATS_EVERY=100                   # Progress line every N passes (0 = off)
OUTPUT_DIR=.                      # Where monitor CSV files go
# UNASSIGNED_ROOM_LABEL=No room

# Analysis
ANALYSIS_FILE=loxone_analysis.json

# Logging
LOG_LEVEL=info                    # debug, info, warning, critical
LOG_TO_FILE=false                 # Also write logs to LOG_FILE_PATH
# LOG_FILE_PATH=logs/miniserver.log
`;

/**
 * Create a .env.example file if it doesn't exist
 *
 * @returns true when the file was written
 */
export function createEnvExample(examplePath: string = path.resolve(process.cwd(), '.env.example')): boolean {
  // Skip if .env.example already exists (manually maintained)
  if (fs.existsSync(examplePath)) {
    return false;
  }

  fs.writeFileSync(examplePath, ENV_EXAMPLE);
  return true;
}
