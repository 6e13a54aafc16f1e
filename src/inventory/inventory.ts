/**
 * Inventory parser
 * Turns the controller's structure document into a read-only Catalog
 */

import { isPlainObject } from '$types/common';
import { MalformedInventoryError } from '$types/errors';

import { optionalCollection, readString, requireCollection, resolveEnvelope } from './helpers';

import type { ControllerUuid } from '$types/common';
import type { Catalog, Category, ControlEntry, ControllerInfo, Room } from './types';

/** Type tag used when a control declares none */
export const UNKNOWN_TYPE_TAG = 'unknown';

interface Named {
  readonly id: ControllerUuid;
  readonly name: string;
  readonly rawAttributes: Readonly<Record<string, unknown>>;
}

function parseNamed(collection: Record<string, unknown>): Map<ControllerUuid, Named> {
  const result = new Map<ControllerUuid, Named>();

  for (const id of Object.keys(collection)) {
    const attributes = collection[id];
    // Rooms and categories without attributes are still valid targets
    const fields = isPlainObject(attributes) ? attributes : {};

    result.set(id, Object.freeze({
      id,
      name: readString(fields, 'name') ?? id,
      rawAttributes: Object.freeze({ ...fields })
    }));
  }

  return result;
}

function parseInfo(payload: Record<string, unknown>): ControllerInfo {
  const msInfo = payload['msInfo'];
  const fields = isPlainObject(msInfo) ? msInfo : {};

  return Object.freeze({
    serverName: readString(fields, 'serverName') ?? readString(fields, 'msName'),
    softwareVersion: readString(fields, 'swVersion'),
    lastModified: readString(payload, 'lastModified')
  });
}

function resolveReference(
  attributes: Record<string, unknown>,
  key: string,
  known: ReadonlyMap<ControllerUuid, unknown>
): ControllerUuid | null {
  const ref = readString(attributes, key);
  return ref !== undefined && known.has(ref) ? ref : null;
}

function appendTo<K>(index: Map<K, ControlEntry[]>, key: K, entry: ControlEntry): void {
  const group = index.get(key);
  if (group) {
    group.push(entry);
  } else {
    index.set(key, [entry]);
  }
}

/**
 * Parse a structure document into a Catalog
 *
 * Accepts both wire variants (with or without the legacy "LL" envelope); the
 * resulting catalog is the same for the same inner payload. Unknown control
 * types are kept verbatim. Controls whose room does not exist are kept with
 * roomId = null.
 *
 * @param document - Parsed JSON as returned by the controller
 * @returns Frozen catalog with type and room indices
 * @throws {MalformedInventoryError} If controls or rooms are missing, or a control is not an object
 */
export function parseInventory(document: unknown): Catalog {
  const { payload } = resolveEnvelope(document);

  const rawControls = requireCollection(payload, 'controls');
  const rooms: Map<ControllerUuid, Room> = parseNamed(requireCollection(payload, 'rooms'));
  const categories: Map<ControllerUuid, Category> = parseNamed(optionalCollection(payload, 'cats'));

  const controls: ControlEntry[] = [];
  const controlsById = new Map<ControllerUuid, ControlEntry>();
  const byType = new Map<string, ControlEntry[]>();
  const byRoomId = new Map<ControllerUuid | null, ControlEntry[]>();

  for (const id of Object.keys(rawControls)) {
    const attributes = rawControls[id];
    if (!isPlainObject(attributes)) {
      throw new MalformedInventoryError('Control "' + id + '" must be an object');
    }

    const entry: ControlEntry = Object.freeze({
      id,
      name: readString(attributes, 'name') ?? id,
      typeTag: readString(attributes, 'type') ?? UNKNOWN_TYPE_TAG,
      roomId: resolveReference(attributes, 'room', rooms),
      categoryId: resolveReference(attributes, 'cat', categories),
      rawAttributes: Object.freeze({ ...attributes })
    });

    controls.push(entry);
    controlsById.set(id, entry);
    appendTo(byType, entry.typeTag, entry);
    appendTo(byRoomId, entry.roomId, entry);
  }

  for (const group of byType.values()) Object.freeze(group);
  for (const group of byRoomId.values()) Object.freeze(group);

  return Object.freeze({
    info: parseInfo(payload),
    controls: Object.freeze(controls),
    controlsById,
    rooms,
    categories,
    byType,
    byRoomId
  });
}
