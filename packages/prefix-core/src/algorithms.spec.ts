import { describe, it, expect } from 'vitest';
import { ALGORITHMS, ALGORITHM_IDS, binarySearch, character, isAlgorithmId, trie } from './algorithms.js';
import { PrefixError } from './errors.js';
import type { AlgorithmId, PrefixFinder } from './types.js';

// Seeded generator so failures reproduce
function mulberry32(seed: number) {
  return function() {
    let t = seed += 0x6D2B79F5;
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomLists(count: number, seed: number): string[][] {
  const rand = mulberry32(seed);
  const alphabet = 'ab/_';
  const lists: string[][] = [];
  for (let n = 0; n < count; n++) {
    const stem = Array.from({ length: Math.floor(rand() * 6) }, () => alphabet[Math.floor(rand() * alphabet.length)]).join('');
    const size = 1 + Math.floor(rand() * 6);
    const list: string[] = [];
    for (let i = 0; i < size; i++) {
      const tail = Array.from({ length: Math.floor(rand() * 4) }, () => alphabet[Math.floor(rand() * alphabet.length)]).join('');
      list.push(stem.slice(0, Math.floor(rand() * (stem.length + 1))) + tail);
    }
    lists.push(list);
  }
  return lists;
}

const cases: [string[], string][] = [
  [['prefix_test_1', 'prefix_test_2'], 'prefix_test_'],
  [['prefix_test_1', 'prefix_test_2', 'prefix_demo'], 'prefix_'],
  [['abc', 'xyz'], ''],
  [['', 'abc'], ''],
  [['abc', ''], ''],
  [['ab', 'abc', 'abcd'], 'ab'],
  [['abcd', 'abc', 'ab'], 'ab'],
  [['same', 'same'], 'same'],
  [['', ''], ''],
  [['interspecies', 'interstellar', 'interstate'], 'inters']
];

describe.each(ALGORITHM_IDS.map((id): [AlgorithmId, PrefixFinder] => [id, ALGORITHMS[id]]))('%s', (_id, find) => {
  it.each(cases)('finds the prefix of %j', (input, expected) => {
    expect(find(input)).toBe(expected);
  });

  it('returns a single string unchanged', () => {
    expect(find(['single'])).toBe('single');
    expect(find([''])).toBe('');
  });

  it('rejects an empty list', () => {
    expect(() => find([])).toThrow(PrefixError);
    try {
      find([]);
    } catch (e) {
      expect(e instanceof PrefixError && e.kind).toBe('empty_input');
    }
  });

  it('does not mutate its input', () => {
    const input = ['b', 'a', 'c'];
    find(input);
    expect(input).toEqual(['b', 'a', 'c']);
  });

  it('compares code units, not normalized characters', () => {
    // precomposed vs decomposed e-acute
    expect(find(['caf\u00e9', 'cafe\u0301'])).toBe('caf');
  });
});

describe('algorithm equivalence', () => {
  const lists = randomLists(300, 42);

  it('all three agree on random lists', () => {
    for (const list of lists) {
      const expected = character(list);
      expect(binarySearch(list)).toBe(expected);
      expect(trie(list)).toBe(expected);
    }
  });

  it('returns a prefix of every string that cannot be extended', () => {
    for (const list of lists) {
      const prefix = character(list);
      for (const s of list) expect(s.startsWith(prefix)).toBe(true);
      if (list.length < 2) continue;
      const shortest = Math.min(...list.map(s => s.length));
      if (prefix.length === shortest) continue;
      for (const s of list) {
        const longer = s.slice(0, prefix.length + 1);
        expect(list.every(t => t.startsWith(longer))).toBe(false);
      }
    }
  });
});

describe('isAlgorithmId', () => {
  it('accepts the three identifiers only', () => {
    expect(ALGORITHM_IDS.every(isAlgorithmId)).toBe(true);
    expect(isAlgorithmId('binarySearch')).toBe(false);
    expect(isAlgorithmId('')).toBe(false);
  });
});
