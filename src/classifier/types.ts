/**
 * Classifier type definitions
 */

import type { ControlEntry } from '@inventory';

/**
 * Classifier options
 */
export interface ClassifierOptions {
  /** Bucket name for controls without a room */
  unassignedRoomLabel: string;
}

/**
 * Scalar counts of one catalog
 */
export interface ClassificationTotals {
  controls: number;
  rooms: number;
  /** Distinct type tags */
  types: number;
  categories: number;
}

/**
 * Grouped views over a catalog.
 * Groups appear in first-seen order; entries keep catalog order.
 */
export interface Classification {
  readonly byType: ReadonlyMap<string, readonly ControlEntry[]>;
  readonly byRoom: ReadonlyMap<string, readonly ControlEntry[]>;
  readonly totals: Readonly<ClassificationTotals>;
}
