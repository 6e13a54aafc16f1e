/**
 * CSV encoding helpers
 */

import { RECORD_COLUMNS } from '@utils/constants';
import { formatRecordTimestamp } from '@utils/time';

import type { ChangeRecord } from './types';

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it holds a comma, a double quote, CR or LF (RFC 4180).
 * Embedded quotes are doubled.
 */
export function escapeCsvField(field: string): string {
  if (!NEEDS_QUOTING.test(field)) {
    return field;
  }
  return '"' + field.replace(/"/g, '""') + '"';
}

/**
 * Join fields into one CSV line, CRLF-terminated
 */
export function encodeCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',') + '\r\n';
}

/**
 * Header line written at the top of a new record file
 */
export const CSV_HEADER = encodeCsvRow(RECORD_COLUMNS);

/**
 * Record fields in column order: timestamp, uuid, name, type, room, state
 */
export function recordToRow(record: ChangeRecord): string[] {
  return [
    formatRecordTimestamp(record.timestamp),
    record.entityId,
    record.name,
    record.typeTag,
    record.roomName,
    String(record.newValue)
  ];
}
