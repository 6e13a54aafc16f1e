/**
 * Controller client type definitions
 */

/**
 * Credentials sent as HTTP Basic auth
 */
export interface ControllerAuth {
  user: string;
  password: string;
}

/**
 * Client configuration
 */
export interface ControllerClientConfig {
  host: string;
  /** Omitted from the URL when empty or 80 */
  port?: number | null;
  auth: ControllerAuth;
  /** Structure download timeout (ms) */
  structureTimeoutMs?: number;
  /** Single state read timeout (ms) */
  stateTimeoutMs?: number;
}

/**
 * Fetch implementation; the global one by default
 */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;
