/**
 * Catalog classification
 * Groups controls by type and by room and counts them
 */

import { roomNameOf } from './helpers';

import type { Catalog, ControlEntry } from '@inventory';
import type { Classification, ClassifierOptions } from './types';

export const DEFAULT_CLASSIFIER_OPTIONS: Readonly<ClassifierOptions> = {
  unassignedRoomLabel: 'No room'
};

/**
 * Group a catalog by type tag and by room name
 *
 * Every control lands in exactly one type group and exactly one room group
 * (controls without a room share the unassigned bucket), so both groupings
 * sum to the control count.
 *
 * @example
 * ```typescript
 * const { byType, totals } = classifyCatalog(catalog);
 * byType.get('Dimmer'); // dimmers, in catalog order
 * totals.types;         // distinct type tags
 * ```
 */
export function classifyCatalog(
  catalog: Catalog,
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS
): Classification {
  const byRoom = new Map<string, ControlEntry[]>();

  for (const entry of catalog.controls) {
    const roomName = roomNameOf(catalog, entry, options.unassignedRoomLabel);
    const group = byRoom.get(roomName);
    if (group) {
      group.push(entry);
    } else {
      byRoom.set(roomName, [entry]);
    }
  }

  return {
    byType: catalog.byType,
    byRoom,
    totals: {
      controls: catalog.controls.length,
      rooms: catalog.rooms.size,
      types: catalog.byType.size,
      categories: catalog.categories.size
    }
  };
}
