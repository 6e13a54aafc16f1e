/**
 * Selection session state machine
 *
 *   prompting --token adds--> accumulating --empty token--> done
 *        \____________________empty token / all selected______/
 */

import { SelectionSyntaxError } from '$types/errors';

import { parseSelectionToken } from './grammar';

import type { SelectionOutcome, SelectionPhase, SelectionSession } from './types';

/**
 * Create a selection session over a numbered listing
 *
 * Tokens are applied one at a time and unioned; duplicates across tokens are
 * dropped, keeping first-seen order. A rejected token leaves the selection
 * untouched and the session open.
 *
 * @param listing - Entries in presentation order (position 1 = listing[0])
 */
export function createSelectionSession<T>(listing: readonly T[]): SelectionSession<T> {
  const chosen: T[] = [];
  const chosenPositions = new Set<number>();
  let phase: SelectionPhase = 'prompting';

  function finish(): SelectionOutcome<T> {
    phase = 'done';
    return { kind: 'done', selected: chosen.slice() };
  }

  function add(positions: readonly number[]): SelectionOutcome<T> {
    const added: T[] = [];

    for (const position of positions) {
      if (chosenPositions.has(position)) {
        continue;
      }
      chosenPositions.add(position);
      const entry = listing[position - 1];
      chosen.push(entry);
      added.push(entry);
    }

    if (added.length === 0) {
      return { kind: 'duplicate' };
    }

    const complete = chosen.length === listing.length;
    phase = complete ? 'done' : 'accumulating';
    return { kind: 'added', entries: added, complete };
  }

  function allPositions(): number[] {
    const positions: number[] = [];
    for (let position = 1; position <= listing.length; position++) {
      positions.push(position);
    }
    return positions;
  }

  function submit(token: string): SelectionOutcome<T> {
    if (phase === 'done') {
      return { kind: 'done', selected: chosen.slice() };
    }

    try {
      const parsed = parseSelectionToken(token, listing.length);

      switch (parsed.kind) {
        case 'terminate':
          return finish();
        case 'all':
          return add(allPositions());
        case 'positions':
          return add(parsed.positions);
      }
    } catch (err) {
      if (err instanceof SelectionSyntaxError) {
        return { kind: 'rejected', error: err };
      }
      throw err;
    }
  }

  return {
    submit: submit,
    phase: function() { return phase; },
    selection: function() { return chosen.slice(); },
    listingSize: function() { return listing.length; }
  };
}
