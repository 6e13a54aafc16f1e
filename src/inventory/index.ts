export { parseInventory, UNKNOWN_TYPE_TAG } from './inventory';
export { resolveEnvelope } from './helpers';
export type {
  Catalog,
  Category,
  ControlEntry,
  ControllerInfo,
  EnvelopeKind,
  ResolvedEnvelope,
  Room
} from './types';
