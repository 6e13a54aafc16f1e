import type { AppConfig } from '@boot/types';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';
import {
  addWarning,
  validateHost,
  validateIntegerRange,
  validateNonEmpty
} from './helpers';

/**
 * Validate a loaded configuration
 *
 * Field names in the result are the environment variables a user edits.
 */
export function validateConfig(config: AppConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Controller
  validateHost(config.host, 'LOXONE_IP', errors);
  if (config.port !== null) {
    validateIntegerRange(config.port, 'LOXONE_PORT', 1, 65535, errors, warnings);
  }
  validateNonEmpty(config.user, 'LOXONE_USER', errors);
  if (config.user === 'admin' && config.password === 'admin') {
    addWarning(warnings, 'LOXONE_PASSWORD', 'Using the factory credentials admin/admin');
  }

  // Timeouts
  validateIntegerRange(config.structureTimeoutMs, 'STRUCTURE_TIMEOUT_MS', 1, 600000, errors, warnings, 5000, 120000);
  validateIntegerRange(config.stateTimeoutMs, 'STATE_TIMEOUT_MS', 1, 60000, errors, warnings, 500, 15000);

  // Monitor
  validateIntegerRange(config.pollIntervalMs, 'POLL_INTERVAL_MS', 100, 60000, errors, warnings, 500, 10000);
  validateIntegerRange(config.statsEvery, 'STATS_EVERY', 0, 1000000, errors, warnings);
  validateNonEmpty(config.unassignedRoomLabel, 'UNASSIGNED_ROOM_LABEL', errors);

  // Output
  validateNonEmpty(config.analysisFile, 'ANALYSIS_FILE', errors);
  validateNonEmpty(config.outputDir, 'OUTPUT_DIR', errors);
  if (config.logToFile) {
    validateNonEmpty(config.logFilePath, 'LOG_FILE_PATH', errors);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
