export type { ControllerUuid, ControlValue, RawAttributes } from './common';
export { isPlainObject } from './common';
export {
  MiniserverError,
  MalformedInventoryError,
  SelectionSyntaxError,
  TransientFetchError,
  AuthenticationError,
  RecordPersistError,
  ConfigValidationError
} from './errors';
