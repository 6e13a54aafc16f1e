/**
 * Selection grammar
 *
 * Token forms, positions are 1-based:
 *   n          one entry
 *   a-b        inclusive range, a <= b
 *   n1,n2,...  list; items may be single positions or ranges
 *   all        every entry (also "todos" and "*")
 *   (empty)    end of selection
 */

import { SelectionSyntaxError } from '$types/errors';
import { parseUnsignedInteger } from '@utils/number';

import type { SelectionToken } from './types';

/** Case-insensitive keywords that select the whole listing */
export const ALL_KEYWORDS: readonly string[] = ['all', 'todos', '*'];

function checkBounds(token: string, position: number, listingSize: number): void {
  if (position < 1 || position > listingSize) {
    const reason = listingSize === 0
      ? 'the listing is empty'
      : 'position ' + position + ' is out of range (1-' + listingSize + ')';
    throw new SelectionSyntaxError(token, reason);
  }
}

function parseBound(token: string, text: string): number {
  const value = parseUnsignedInteger(text.trim());
  if (value === null) {
    throw new SelectionSyntaxError(token, '"' + text.trim() + '" is not a number');
  }
  return value;
}

function parseItem(token: string, item: string, listingSize: number, into: number[]): void {
  const text = item.trim();
  if (text.length === 0) {
    throw new SelectionSyntaxError(token, 'empty list item');
  }

  if (!text.includes('-')) {
    const position = parseBound(token, text);
    checkBounds(token, position, listingSize);
    into.push(position);
    return;
  }

  const bounds = text.split('-');
  if (bounds.length !== 2) {
    throw new SelectionSyntaxError(token, 'range "' + text + '" must have the form a-b');
  }

  const start = parseBound(token, bounds[0]);
  const end = parseBound(token, bounds[1]);
  if (start > end) {
    throw new SelectionSyntaxError(token, 'range start ' + start + ' is greater than range end ' + end);
  }
  checkBounds(token, start, listingSize);
  checkBounds(token, end, listingSize);

  for (let position = start; position <= end; position++) {
    into.push(position);
  }
}

/**
 * Parse one selection token against a listing of `listingSize` entries
 *
 * @throws {SelectionSyntaxError} For out-of-range positions, reversed or
 *   non-numeric ranges, and anything unparseable. Nothing from a rejected
 *   token is applied.
 */
export function parseSelectionToken(token: string, listingSize: number): SelectionToken {
  const text = token.trim();

  if (text.length === 0) {
    return { kind: 'terminate' };
  }
  if (ALL_KEYWORDS.includes(text.toLowerCase())) {
    return { kind: 'all' };
  }

  const collected: number[] = [];
  for (const item of text.split(',')) {
    parseItem(token, item, listingSize, collected);
  }

  return { kind: 'positions', positions: [...new Set(collected)] };
}

/**
 * Resolve a token straight to listing entries
 * Returns an empty list for the terminator.
 *
 * @throws {SelectionSyntaxError} As parseSelectionToken
 */
export function selectEntries<T>(listing: readonly T[], token: string): T[] {
  const parsed = parseSelectionToken(token, listing.length);

  switch (parsed.kind) {
    case 'terminate':
      return [];
    case 'all':
      return [...listing];
    case 'positions':
      return parsed.positions.map((position) => listing[position - 1]);
  }
}
