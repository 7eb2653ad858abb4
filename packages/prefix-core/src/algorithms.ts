/**
 * Longest-common-prefix algorithms. All three share one signature and must
 * return identical output for identical input.
 */

import { PrefixError, EMPTY_INPUT_MESSAGE } from './errors.js';
import { build } from './trie.js';
import type { AlgorithmId, PrefixFinder } from './types.js';

function shortestLength(strings: readonly string[]): number {
  let min = Infinity;
  for (const s of strings) if (s.length < min) min = s.length;
  return min;
}

function edge(strings: readonly string[]): string | null {
  if (strings.length === 0) throw new PrefixError('empty_input', EMPTY_INPUT_MESSAGE);
  if (strings.length === 1) return strings[0];
  return null;
}

/**
 * Scan column by column up to the shortest length, stopping at the first
 * mismatch. O(shortest * count).
 */
export function character(strings: readonly string[]): string {
  const single = edge(strings);
  if (single !== null) return single;

  const first = strings[0];
  const bound = shortestLength(strings);
  let i = 0;

  scan: while (i < bound) {
    const ch = first[i];
    for (let j = 1; j < strings.length; j++) {
      if (strings[j][i] !== ch) break scan;
    }
    i++;
  }

  return first.slice(0, i);
}

/**
 * Binary search on the prefix length, testing the first string's prefix of
 * length `mid` against every string.
 */
export function binarySearch(strings: readonly string[]): string {
  const single = edge(strings);
  if (single !== null) return single;

  const first = strings[0];
  const isCommon = (length: number): boolean => {
    if (length === 0) return true;
    const prefix = first.slice(0, length);
    return strings.every(s => s.startsWith(prefix));
  };

  let low = 0;
  let high = shortestLength(strings);
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (isCommon(mid)) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return first.slice(0, low);
}

/**
 * Insert every string into a fresh trie and walk the shared spine
 */
export function trie(strings: readonly string[]): string {
  const single = edge(strings);
  if (single !== null) return single;

  return build(strings).longestCommonPrefix();
}

export const ALGORITHM_IDS: readonly AlgorithmId[] = ['character', 'binary_search', 'trie'];
export const DEFAULT_ALGORITHM: AlgorithmId = 'character';

export const ALGORITHMS: Readonly<Record<AlgorithmId, PrefixFinder>> = {
  character,
  binary_search: binarySearch,
  trie
};

export function isAlgorithmId(id: string): id is AlgorithmId {
  return ALGORITHM_IDS.some(a => a === id);
}
