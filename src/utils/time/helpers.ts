/**
 * Time formatting helpers
 */

function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}

/**
 * Format a record timestamp: UTC, ISO-8601, second precision
 * @example formatRecordTimestamp(new Date(Date.UTC(2026, 9, 19, 13, 5, 7, 450))) === '2026-10-19T13:05:07Z'
 */
export function formatRecordTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19) + 'Z';
}

/**
 * Compact local-time stamp for file names (YYYYMMDD_HHMMSS)
 */
export function formatFileStamp(date: Date): string {
  return String(date.getFullYear()) +
    pad2(date.getMonth() + 1) +
    pad2(date.getDate()) +
    '_' +
    pad2(date.getHours()) +
    pad2(date.getMinutes()) +
    pad2(date.getSeconds());
}
