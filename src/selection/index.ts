export { parseSelectionToken, selectEntries, ALL_KEYWORDS } from './grammar';
export { createSelectionSession } from './session';
export type { SelectionOutcome, SelectionPhase, SelectionSession, SelectionToken } from './types';
