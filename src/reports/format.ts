/**
 * Plain-text rendering of the listing and the analysis summary
 *
 * Lines carry no colour; the CLI decides how to print them.
 */

import { describeType, roomNameOf } from '@classifier';

import type { Catalog, ControlEntry } from '@inventory';
import type { AnalysisReport, ListingRow, ReportControl, SummaryLimits } from './types';

export const DEFAULT_SUMMARY_LIMITS: Readonly<SummaryLimits> = {
  perType: 10,
  perRoom: 8
};

const SELECTION_PREVIEW = 10;

/**
 * Number every control in catalog order, starting at 1
 */
export function buildListing(catalog: Catalog, unassignedRoomLabel: string): ListingRow[] {
  return catalog.controls.map((entry, i) => ({
    index: i + 1,
    entry: entry,
    roomName: roomNameOf(catalog, entry, unassignedRoomLabel),
    typeLabel: describeType(entry.typeTag)
  }));
}

/**
 * One listing line: right-aligned index, room and type in fixed columns, name
 *
 * @example formatListingLine(row) === '   3. [Kitchen]            Dimmer                    Ceiling light'
 */
export function formatListingLine(row: ListingRow): string {
  return String(row.index).padStart(4) + '. ' +
    ('[' + row.roomName + ']').padEnd(20) + ' ' +
    row.typeLabel.padEnd(25) + ' ' +
    row.entry.name;
}

function more(count: number, shown: number): string[] {
  return count > shown ? ['    ... and ' + (count - shown) + ' more'] : [];
}

function sortedEntries(groups: Record<string, ReportControl[]>): Array<[string, ReportControl[]]> {
  return Object.entries(groups).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Summary of an analysis: totals, rooms, then controls grouped by type and by
 * room (groups sorted by name, each truncated to `limits`)
 */
export function formatAnalysisSummary(
  report: AnalysisReport,
  limits: SummaryLimits = DEFAULT_SUMMARY_LIMITS
): string[] {
  const lines: string[] = [];
  const info = report.controller;

  lines.push('Summary');
  if (info.serverName !== null) {
    lines.push('  Controller: ' + info.serverName + (info.softwareVersion !== null ? ' (' + info.softwareVersion + ')' : ''));
  }
  lines.push('  Controls: ' + info.totalControls);
  lines.push('  Rooms: ' + info.totalRooms);
  lines.push('  Categories: ' + info.totalCategories);
  lines.push('  Types: ' + info.totalTypes);

  const rooms = Object.values(report.rooms);
  lines.push('');
  lines.push('Rooms (' + rooms.length + ')');
  rooms.forEach((room, i) => {
    lines.push('  ' + (i + 1) + '. ' + room.name);
  });

  lines.push('');
  lines.push('Controls by type');
  for (const [label, controls] of sortedEntries(report.controlsByType)) {
    lines.push('  ' + label + ' (' + controls.length + ')');
    for (const control of controls.slice(0, limits.perType)) {
      lines.push('    - ' + control.name + (control.room !== null ? ' [' + control.room + ']' : ''));
    }
    lines.push(...more(controls.length, limits.perType));
  }

  lines.push('');
  lines.push('Controls by room');
  for (const [room, controls] of sortedEntries(report.controlsByRoom)) {
    lines.push('  ' + room + ' (' + controls.length + ' controls)');
    for (const control of controls.slice(0, limits.perRoom)) {
      lines.push('    - ' + control.name + ' (' + control.typeReadable + ')');
    }
    lines.push(...more(controls.length, limits.perRoom));
  }

  return lines;
}

/**
 * Short recap of a finished selection: first ten names, then a count
 */
export function formatSelectionSummary(selected: readonly ListingRow[]): string[] {
  const lines = ['Selected ' + selected.length + ' controls'];
  selected.slice(0, SELECTION_PREVIEW).forEach((row, i) => {
    lines.push('  ' + (i + 1) + '. ' + row.entry.name + ' [' + row.roomName + ']');
  });
  lines.push(...more(selected.length, SELECTION_PREVIEW).map((line) => line.slice(2)));
  return lines;
}

/**
 * Entries of the given listing rows, in the same order
 */
export function entriesOf(rows: readonly ListingRow[]): ControlEntry[] {
  return rows.map((row) => row.entry);
}
