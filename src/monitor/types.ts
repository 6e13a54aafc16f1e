/**
 * Change-detection monitor type definitions
 */

import type { ControlValue, ControllerUuid } from '$types/common';
import type { Catalog, ControlEntry } from '@inventory';
import type { Logger } from '@logging';
import type { RecordSink } from '@records';

/**
 * Canonical form a value is compared in
 */
export type NormalizedValue = number | string;

/**
 * Live-state capability of the controller client
 */
export interface StateReader {
  fetchCurrentValue(entityId: ControllerUuid): Promise<ControlValue>;
}

/**
 * What to watch: the selected entries and the catalog they came from
 */
export interface MonitorSelection {
  catalog: Catalog;
  entries: readonly ControlEntry[];
}

/**
 * Monitor external dependencies
 */
export interface MonitorDependencies {
  reader: StateReader;
  sink: RecordSink;
  logger: Logger;
  /** Wall clock; stamped on every record */
  clock: () => Date;
  /** Abortable wait; resolves false when the signal fired */
  sleep: (ms: number, signal: AbortSignal) => Promise<boolean>;
}

/**
 * Monitor tuning
 */
export interface MonitorOptions {
  /** Wait between sampling passes (ms) */
  pollIntervalMs: number;
  /** Log progress every N passes; 0 disables */
  statsEvery: number;
  /** Room label for controls without a room */
  unassignedRoomLabel: string;
}

/**
 * A selected control with the fields every record repeats
 */
export interface MonitoredControl {
  id: ControllerUuid;
  name: string;
  typeTag: string;
  roomName: string;
}

/**
 * Last observation of one control. Owned by a single run.
 */
export interface MonitorState {
  value: NormalizedValue;
  raw: ControlValue;
  observedAt: Date;
}

/**
 * Counters reported when a run ends
 */
export interface MonitorSummary {
  /** Completed sampling passes (the baseline pass is not counted) */
  checksPerformed: number;
  /** Transitions recorded, baselines excluded */
  changesRecorded: number;
  baselineRecords: number;
  failedReads: number;
  startedAt: Date;
  stoppedAt: Date;
}

/**
 * Change-detection monitor
 */
export interface ChangeMonitor {
  /**
   * Capture baselines, then sample until `signal` aborts.
   * Rejects on an authentication failure or a record that cannot be written.
   */
  run(signal: AbortSignal): Promise<MonitorSummary>;
}
