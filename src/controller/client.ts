/**
 * Miniserver HTTP client
 * Downloads the structure document and reads live control states
 */

import { AuthenticationError, TransientFetchError } from '$types/errors';
import { LOXONE_PATHS } from '@utils/constants';

import { basicAuthHeader, buildBaseUrl, parseStateResponse, statePath } from './helpers';

import type { ControlValue, ControllerUuid } from '$types/common';
import type { ControllerClientConfig, FetchFunction } from './types';

const DEFAULT_STRUCTURE_TIMEOUT_MS = 30000;
const DEFAULT_STATE_TIMEOUT_MS = 5000;

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ' (' + error.cause.message + ')' : '';
    return error.message + cause;
  }
  return String(error);
}

export class MiniserverClient {
  readonly baseUrl: string;
  private readonly user: string;
  private readonly authHeader: string;
  private readonly structureTimeoutMs: number;
  private readonly stateTimeoutMs: number;
  private readonly fetchImpl: FetchFunction;

  constructor(config: ControllerClientConfig, fetchImpl?: FetchFunction) {
    this.baseUrl = buildBaseUrl(config.host, config.port);
    this.user = config.auth.user;
    this.authHeader = basicAuthHeader(config.auth);
    this.structureTimeoutMs = config.structureTimeoutMs ?? DEFAULT_STRUCTURE_TIMEOUT_MS;
    this.stateTimeoutMs = config.stateTimeoutMs ?? DEFAULT_STATE_TIMEOUT_MS;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * GET a path and parse the JSON body
   *
   * 401/403 become AuthenticationError; timeouts, connection failures,
   * other statuses and unparseable bodies become TransientFetchError.
   */
  private async getJson(path: string, timeoutMs: number, entityId?: ControllerUuid): Promise<unknown> {
    const url = this.baseUrl + path;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: this.authHeader
          },
          signal: controller.signal
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw new TransientFetchError('Request timeout after ' + timeoutMs + 'ms', url, { entityId, cause: error });
        }
        throw new TransientFetchError('Connection failed: ' + describeCause(error), url, { entityId, cause: error });
      }

      if (response.status === 401 || response.status === 403) {
        throw new AuthenticationError(this.user, response.status);
      }

      if (!response.ok) {
        throw new TransientFetchError('HTTP ' + response.status + ': ' + response.statusText, url, { entityId });
      }

      try {
        return await response.json();
      } catch (error) {
        if (isAbortError(error)) {
          throw new TransientFetchError('Request timeout after ' + timeoutMs + 'ms', url, { entityId, cause: error });
        }
        throw new TransientFetchError('Invalid JSON in response', url, { entityId, cause: error });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Download the structure document (shape is checked by the inventory parser)
   */
  async fetchStructure(): Promise<unknown> {
    return this.getJson(LOXONE_PATHS.STRUCTURE, this.structureTimeoutMs);
  }

  /**
   * Read the current value of one control
   */
  async fetchCurrentValue(entityId: ControllerUuid): Promise<ControlValue> {
    const body = await this.getJson(statePath(entityId), this.stateTimeoutMs, entityId);
    const result = parseStateResponse(body);

    if (!result.ok) {
      throw new TransientFetchError(
        'Unexpected state reply for ' + entityId + ': ' + result.reason,
        this.baseUrl + statePath(entityId),
        { entityId }
      );
    }

    return result.value;
  }
}
