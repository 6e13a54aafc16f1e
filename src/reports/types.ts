/**
 * Analysis report type definitions
 *
 * The report is the JSON document written by the analysis command.
 * Everything in it is plain data.
 */

import type { ControllerUuid } from '$types/common';
import type { ControlEntry } from '@inventory';

export interface ReportControl {
  uuid: ControllerUuid;
  name: string;
  type: string;
  typeReadable: string;
  /** Room display name, null when unassigned */
  room: string | null;
  category: string | null;
  states: unknown;
  details: unknown;
}

export interface ReportRoom {
  name: string;
  type: number | null;
}

export interface ReportControllerSummary {
  serverName: string | null;
  softwareVersion: string | null;
  lastModified: string | null;
  totalControls: number;
  totalRooms: number;
  totalTypes: number;
  totalCategories: number;
}

export interface AnalysisReport {
  /** ISO-8601 time the report was built */
  generatedAt: string;
  controller: ReportControllerSummary;
  rooms: Record<ControllerUuid, ReportRoom>;
  /** Readable type label -> controls */
  controlsByType: Record<string, ReportControl[]>;
  /** Room display name (or the unassigned label) -> controls */
  controlsByRoom: Record<string, ReportControl[]>;
  allControls: ReportControl[];
}

/**
 * One numbered line of the selection listing
 */
export interface ListingRow {
  /** 1-based position */
  index: number;
  entry: ControlEntry;
  roomName: string;
  typeLabel: string;
}

/**
 * How many controls the text summary shows per group before "... and N more"
 */
export interface SummaryLimits {
  perType: number;
  perRoom: number;
}
