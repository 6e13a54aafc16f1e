/**
 * Inventory parsing helpers
 */

import { isPlainObject } from '$types/common';
import { MalformedInventoryError } from '$types/errors';
import { ENVELOPE_KEY } from '@utils/constants';

import type { ResolvedEnvelope } from './types';

const REQUIRED_COLLECTIONS = ['controls', 'rooms'] as const;

function describeKeys(value: Record<string, unknown>): string {
  const keys = Object.keys(value);
  return keys.length > 0 ? keys.join(', ') : '(none)';
}

/**
 * Decide once whether the document is wrapped in the legacy envelope.
 *
 * The envelope is unwrapped only when it holds both required collections;
 * otherwise the document itself is taken as the payload.
 *
 * @throws {MalformedInventoryError} If the document is not a JSON object
 */
export function resolveEnvelope(document: unknown): ResolvedEnvelope {
  if (!isPlainObject(document)) {
    throw new MalformedInventoryError('Structure document must be a JSON object');
  }

  const wrapped = document[ENVELOPE_KEY];
  if (isPlainObject(wrapped) && REQUIRED_COLLECTIONS.every((key) => key in wrapped)) {
    return { kind: 'legacy', payload: wrapped };
  }

  return { kind: 'flat', payload: document };
}

/**
 * Read a required id -> attributes collection
 *
 * @throws {MalformedInventoryError} If the collection is missing or not an object
 */
export function requireCollection(
  payload: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const collection = payload[key];

  if (collection === undefined) {
    throw new MalformedInventoryError(
      'Structure document has no "' + key + '" collection (found keys: ' + describeKeys(payload) + ')'
    );
  }
  if (!isPlainObject(collection)) {
    throw new MalformedInventoryError('"' + key + '" collection must be an object keyed by uuid');
  }

  return collection;
}

/**
 * Read an optional collection; anything that is not an object counts as empty
 */
export function optionalCollection(
  payload: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const collection = payload[key];
  return isPlainObject(collection) ? collection : {};
}

/**
 * Read a non-empty string attribute
 */
export function readString(attributes: Record<string, unknown>, key: string): string | undefined {
  const value = attributes[key];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}
