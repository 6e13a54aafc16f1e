export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  isValidHostname,
  isValidIpv4,
  validateHost,
  validateIntegerRange,
  validateNonEmpty,
  validateNumberRange
} from './helpers';

export type { ValidationError, ValidationResult, ValidationWarning } from './types';
