/**
 * Selection type definitions
 */

import type { SelectionSyntaxError } from '$types/errors';

/**
 * Parsed meaning of one user-entered token
 */
export type SelectionToken =
  | { kind: 'terminate' }
  | { kind: 'all' }
  /** 1-based listing positions, first-seen order, no repeats */
  | { kind: 'positions'; positions: number[] };

/**
 * Session lifecycle
 * - prompting: nothing selected yet
 * - accumulating: at least one entry selected
 * - done: terminated by empty input, or every entry is selected
 */
export type SelectionPhase = 'prompting' | 'accumulating' | 'done';

/**
 * Result of submitting one token to a session
 */
export type SelectionOutcome<T> =
  | { kind: 'added'; entries: readonly T[]; complete: boolean }
  | { kind: 'duplicate' }
  | { kind: 'rejected'; error: SelectionSyntaxError }
  | { kind: 'done'; selected: readonly T[] };

/**
 * Interactive selection over a fixed numbered listing
 */
export interface SelectionSession<T> {
  /** Apply one token; never throws for bad input */
  submit(token: string): SelectionOutcome<T>;
  /** Current phase */
  phase(): SelectionPhase;
  /** Selected entries in first-seen order */
  selection(): readonly T[];
  /** Size of the numbered listing */
  listingSize(): number;
}
