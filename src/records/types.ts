/**
 * Record sink type definitions
 */

import type { ControlValue, ControllerUuid } from '$types/common';

/**
 * Why a record was emitted: the first reading of a run, or a transition
 */
export type RecordKind = 'baseline' | 'change';

/**
 * One emitted fact about a monitored control. Immutable once created.
 */
export interface ChangeRecord {
  readonly kind: RecordKind;
  readonly timestamp: Date;
  readonly entityId: ControllerUuid;
  readonly name: string;
  readonly typeTag: string;
  readonly roomName: string;
  /** Value as reported by the controller */
  readonly newValue: ControlValue;
  /** Value before the transition; null for a baseline */
  readonly previousValue: ControlValue | null;
}

/**
 * Destination for change records
 *
 * Records arrive in emission order. A sink never reorders or coalesces
 * them, and each append is one physical write.
 */
export interface RecordSink {
  append(record: ChangeRecord): Promise<void>;
  /** Flush and release the destination. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * CSV sink configuration
 */
export interface CsvRecordSinkConfig {
  /** Target file; created when missing, appended to otherwise */
  path: string;
}
