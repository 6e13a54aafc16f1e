/**
 * Global constants used throughout the application
 */

/** Controller endpoints */
export const LOXONE_PATHS = {
  STRUCTURE: '/data/LoxAPP3.json',
  STATE_PREFIX: '/jdev/sps/io/',
  STATE_SUFFIX: '/state',
} as const;

/** Legacy top-level wrapper emitted by some firmware versions */
export const ENVELOPE_KEY = 'LL';

/** CSV columns, in write order */
export const RECORD_COLUMNS = ['timestamp', 'uuid', 'name', 'type', 'room', 'state'] as const;
