/**
 * Controller URL building and response parsing
 */

import { isPlainObject } from '$types/common';
import { LOXONE_PATHS } from '@utils/constants';

import type { ControlValue } from '$types/common';
import type { ControllerAuth } from './types';

const SUCCESS_CODE = 200;

/**
 * Base URL of the controller; the port is left out when empty or 80
 *
 * @example buildBaseUrl('192.168.1.50', 8050) === 'http://192.168.1.50:8050'
 */
export function buildBaseUrl(host: string, port?: number | null): string {
  if (port === undefined || port === null || port === 80) {
    return 'http://' + host;
  }
  return 'http://' + host + ':' + port;
}

/**
 * Path of the live-state endpoint for one control
 */
export function statePath(uuid: string): string {
  return LOXONE_PATHS.STATE_PREFIX + encodeURIComponent(uuid) + LOXONE_PATHS.STATE_SUFFIX;
}

/**
 * Basic auth header value
 */
export function basicAuthHeader(auth: ControllerAuth): string {
  return 'Basic ' + Buffer.from(auth.user + ':' + auth.password, 'utf8').toString('base64');
}

/**
 * Result of reading a state reply
 */
export type StateParseResult =
  | { ok: true; value: ControlValue }
  | { ok: false; reason: string };

/**
 * Extract the value of a state reply
 *
 * The reply must be `{"LL": {...}}` with a `Code` of 200 (number or text)
 * and a string or numeric `value`.
 */
export function parseStateResponse(body: unknown): StateParseResult {
  if (!isPlainObject(body) || !isPlainObject(body.LL)) {
    return { ok: false, reason: 'response has no LL object' };
  }

  const reply = body.LL;
  const code = Number(reply.Code);
  if (code !== SUCCESS_CODE) {
    return { ok: false, reason: 'controller answered with code ' + String(reply.Code) };
  }

  const value = reply.value;
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    return { ok: true, value: value };
  }

  return { ok: false, reason: 'response has no value' };
}
