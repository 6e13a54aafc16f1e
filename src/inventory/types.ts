/**
 * Inventory type definitions
 *
 * The catalog is the parsed form of the controller's structure file
 * (LoxAPP3.json). It is built once per fetch and never mutated.
 */

import type { ControllerUuid, RawAttributes } from '$types/common';

/**
 * Which wire variant the structure document arrived in
 * - legacy: payload wrapped in the top-level "LL" key
 * - flat: payload at the top level
 */
export type EnvelopeKind = 'legacy' | 'flat';

/**
 * Result of envelope detection: the canonical payload plus the variant found
 */
export interface ResolvedEnvelope {
  kind: EnvelopeKind;
  payload: Record<string, unknown>;
}

/**
 * One device or sensor
 */
export interface ControlEntry {
  /** Controller uuid, unique within a snapshot */
  readonly id: ControllerUuid;
  /** Display name (falls back to the id) */
  readonly name: string;
  /** Declared control type, verbatim ("Switch", "Jalousie", ...) */
  readonly typeTag: string;
  /** Room id, null when unassigned or pointing at a room that does not exist */
  readonly roomId: ControllerUuid | null;
  /** Category id, null when unassigned or unknown */
  readonly categoryId: ControllerUuid | null;
  /** Everything the controller sent for this control */
  readonly rawAttributes: RawAttributes;
}

/**
 * Named location
 */
export interface Room {
  readonly id: ControllerUuid;
  readonly name: string;
  readonly rawAttributes: RawAttributes;
}

/**
 * Functional grouping ("Lighting", "Shading", ...)
 */
export interface Category {
  readonly id: ControllerUuid;
  readonly name: string;
  readonly rawAttributes: RawAttributes;
}

/**
 * Controller metadata, when the structure file carries it
 */
export interface ControllerInfo {
  readonly serverName?: string;
  readonly softwareVersion?: string;
  readonly lastModified?: string;
}

/**
 * Full parsed inventory for one fetch
 */
export interface Catalog {
  readonly info: ControllerInfo;
  /** Controls in document order */
  readonly controls: readonly ControlEntry[];
  readonly controlsById: ReadonlyMap<ControllerUuid, ControlEntry>;
  readonly rooms: ReadonlyMap<ControllerUuid, Room>;
  readonly categories: ReadonlyMap<ControllerUuid, Category>;
  /** typeTag -> controls, groups in first-seen order */
  readonly byType: ReadonlyMap<string, readonly ControlEntry[]>;
  /** room id (null = unassigned) -> controls */
  readonly byRoomId: ReadonlyMap<ControllerUuid | null, readonly ControlEntry[]>;
}
