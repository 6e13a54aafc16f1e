/**
 * Analysis report builder
 */

import * as fs from 'fs';
import * as path from 'path';

import { categoryNameOf, describeType, roomNameOf } from '@classifier';

import type { Classification } from '@classifier';
import type { Catalog, ControlEntry } from '@inventory';
import type { AnalysisReport, ReportControl, ReportRoom } from './types';

function toReportControl(catalog: Catalog, entry: ControlEntry): ReportControl {
  const roomName = entry.roomId === null ? null : roomNameOf(catalog, entry, '');
  return {
    uuid: entry.id,
    name: entry.name,
    type: entry.typeTag,
    typeReadable: describeType(entry.typeTag),
    room: roomName,
    category: categoryNameOf(catalog, entry),
    states: entry.rawAttributes['states'] ?? {},
    details: entry.rawAttributes['details'] ?? {}
  };
}

function groupRecord(
  groups: ReadonlyMap<string, readonly ControlEntry[]>,
  keyOf: (key: string) => string,
  byId: ReadonlyMap<string, ReportControl>
): Record<string, ReportControl[]> {
  const buckets = new Map<string, ReportControl[]>();

  for (const [key, entries] of groups) {
    const label = keyOf(key);
    const bucket = buckets.get(label) ?? [];
    buckets.set(label, bucket);
    for (const entry of entries) {
      const control = byId.get(entry.id);
      if (control) {
        bucket.push(control);
      }
    }
  }

  // fromEntries defines own keys, so names like "__proto__" survive
  return Object.fromEntries(buckets);
}

/**
 * Build the analysis document for one catalog
 *
 * @param generatedAt - Stamp written into the report
 */
export function buildAnalysisReport(
  catalog: Catalog,
  classification: Classification,
  generatedAt: Date
): AnalysisReport {
  const allControls = catalog.controls.map((entry) => toReportControl(catalog, entry));
  const byId = new Map(allControls.map((control) => [control.uuid, control]));

  const rooms = new Map<string, ReportRoom>();
  for (const room of catalog.rooms.values()) {
    const type = room.rawAttributes['type'];
    rooms.set(room.id, { name: room.name, type: typeof type === 'number' ? type : null });
  }

  return {
    generatedAt: generatedAt.toISOString(),
    controller: {
      serverName: catalog.info.serverName ?? null,
      softwareVersion: catalog.info.softwareVersion ?? null,
      lastModified: catalog.info.lastModified ?? null,
      totalControls: classification.totals.controls,
      totalRooms: classification.totals.rooms,
      totalTypes: classification.totals.types,
      totalCategories: classification.totals.categories
    },
    rooms: Object.fromEntries(rooms),
    controlsByType: groupRecord(classification.byType, describeType, byId),
    controlsByRoom: groupRecord(classification.byRoom, (name) => name, byId),
    allControls: allControls
  };
}

/**
 * Write the report as indented UTF-8 JSON, creating the directory
 */
export async function saveAnalysisReport(report: AnalysisReport, filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, JSON.stringify(report, null, 2) + '\n', 'utf8');
}
