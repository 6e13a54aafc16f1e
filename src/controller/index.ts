export { MiniserverClient } from './client';
export { basicAuthHeader, buildBaseUrl, parseStateResponse, statePath } from './helpers';

export type { StateParseResult } from './helpers';
export type { ControllerAuth, ControllerClientConfig, FetchFunction } from './types';
