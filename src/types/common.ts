/**
 * Common type definitions used throughout the project
 */

/**
 * Opaque controller identifier (controls, rooms and categories share the scheme)
 */
export type ControllerUuid = string;

/**
 * Value reported by the controller for a control's state.
 * The state endpoint answers with text; parsed sensors may hand back numbers.
 */
export type ControlValue = number | string;

/**
 * Plain JSON object as received from the controller
 */
export type RawAttributes = Readonly<Record<string, unknown>>;

/**
 * Narrow an unknown value to a plain (non-array) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
