/**
 * Value normalisation and comparison for change detection
 */

import { roomNameOf } from '@classifier';
import { parseDecimal } from '@utils/number';

import type { ControlValue } from '$types/common';
import type { MonitoredControl, MonitorSelection, NormalizedValue } from './types';

/**
 * Reduce a reported value to the form it is compared in
 *
 * - numbers stay numbers, with -0 folded into 0
 * - strings are trimmed
 * - a trimmed string holding a plain decimal ("75", "75.0", "-1e3") becomes
 *   that number; a single comma with no dot is read as the decimal
 *   separator ("21,5" is 21.5)
 * - anything else stays the trimmed string, compared case-sensitively
 *
 * @example normalizeValue(' 75.0 ') === 75
 */
export function normalizeValue(value: ControlValue): NormalizedValue {
  if (typeof value === 'number') {
    return value === 0 ? 0 : value;
  }

  const trimmed = value.trim();
  const parsed = parseDecimal(trimmed);
  if (parsed === null) {
    return trimmed;
  }
  return parsed === 0 ? 0 : parsed;
}

/**
 * Compare two normalised values: numbers by value, strings exactly
 */
export function valuesEqual(a: NormalizedValue, b: NormalizedValue): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }
  return a === b;
}

/**
 * Resolve the record fields of every selected control
 */
export function toMonitoredControls(selection: MonitorSelection, unassignedRoomLabel: string): MonitoredControl[] {
  return selection.entries.map((entry) => ({
    id: entry.id,
    name: entry.name,
    typeTag: entry.typeTag,
    roomName: roomNameOf(selection.catalog, entry, unassignedRoomLabel)
  }));
}

/**
 * Render a value for log lines
 */
export function describeValue(value: ControlValue | null): string {
  if (value === null) {
    return '-';
  }
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}
