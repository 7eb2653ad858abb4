import { describe, it, expect, vi } from 'vitest';
import { ALGORITHM_IDS } from './algorithms.js';
import { findProgressivePrefixes } from './progressive.js';

const BASIC = ['prefix_test_1', 'prefix_test_2', 'prefix_demo', 'prefix_example'];

describe('findProgressivePrefixes', () => {
  it('narrows the prefix one string at a time', () => {
    const result = findProgressivePrefixes(BASIC, { algorithm: 'character' });

    expect(result.error).toBeUndefined();
    expect(result.algorithmUsed).toBe('character');
    expect(result.totalSteps).toBe(3);
    expect(result.results.map(s => [s.step, s.stringsCount, s.commonPrefix])).toEqual([
      [1, 2, 'prefix_test_'],
      [2, 3, 'prefix_'],
      [3, 4, 'prefix_']
    ]);
    expect(result.summary).toEqual({
      initialStringsCount: 4,
      finalCommonPrefix: 'prefix_',
      prefixLength: 7
    });
  });

  it('records the exact strings analyzed at each step', () => {
    const result = findProgressivePrefixes(BASIC);
    expect(result.results[0].analyzedStrings).toEqual(['prefix_test_1', 'prefix_test_2']);
    expect(result.results[2].analyzedStrings).toEqual(BASIC);
  });

  it('defaults to the character algorithm without performance data', () => {
    const result = findProgressivePrefixes(['ab', 'ac']);
    expect(result.algorithmUsed).toBe('character');
    expect(result.performanceData).toBeUndefined();
    expect(result.performanceSummary).toBeUndefined();
  });

  it.each(ALGORITHM_IDS)('produces the same steps with %s', algorithm => {
    const result = findProgressivePrefixes(BASIC, { algorithm });
    expect(result.results.map(s => s.commonPrefix)).toEqual(['prefix_test_', 'prefix_', 'prefix_']);
  });

  it('reports an empty list as an error with zero steps', () => {
    const result = findProgressivePrefixes([]);
    expect(result.results).toEqual([]);
    expect(result.totalSteps).toBe(0);
    expect(result.error).toEqual({ kind: 'empty_input', message: 'Empty string list provided' });
    expect(result.summary).toEqual({ initialStringsCount: 0, finalCommonPrefix: '', prefixLength: 0 });
  });

  it('reports an unknown algorithm with the valid identifiers', () => {
    const result = findProgressivePrefixes(['a', 'b'], { algorithm: 'suffix_array' });
    expect(result.totalSteps).toBe(0);
    expect(result.algorithmUsed).toBe('suffix_array');
    expect(result.error).toEqual({
      kind: 'unknown_algorithm',
      message: 'Unknown algorithm: suffix_array. Valid algorithms: character, binary_search, trie',
      validAlgorithms: ['character', 'binary_search', 'trie']
    });
    expect(result.summary.initialStringsCount).toBe(2);
  });

  it('checks for an empty list before the algorithm', () => {
    expect(findProgressivePrefixes([], { algorithm: 'nope' }).error?.kind).toBe('empty_input');
  });

  it('returns one step for a single string', () => {
    const result = findProgressivePrefixes(['single']);
    expect(result.totalSteps).toBe(1);
    expect(result.results).toEqual([
      { step: 1, stringsCount: 1, commonPrefix: 'single', analyzedStrings: ['single'] }
    ]);
    expect(result.summary).toEqual({ initialStringsCount: 1, finalCommonPrefix: 'single', prefixLength: 6 });
  });

  it('handles lists with no shared prefix or empty strings', () => {
    expect(findProgressivePrefixes(['abc', 'xyz']).summary.finalCommonPrefix).toBe('');
    expect(findProgressivePrefixes(['', 'abc']).summary.finalCommonPrefix).toBe('');
    expect(findProgressivePrefixes(['', '', '']).results.map(s => s.commonPrefix)).toEqual(['', '']);
  });

  it('never grows the prefix between steps', () => {
    const input = ['/srv/app/logs/a.log', '/srv/app/logs/b.log', '/srv/app/cache', '/srv/data', '/srv/app/logs/c.log'];
    for (const algorithm of ALGORITHM_IDS) {
      const lengths = findProgressivePrefixes(input, { algorithm }).results.map(s => s.commonPrefix.length);
      expect(lengths).toEqual([14, 9, 5, 5]);
    }
  });

  it('does not mutate or alias the input', () => {
    const input = ['ab', 'ac', 'ad'];
    const result = findProgressivePrefixes(input);
    input[0] = 'zz';
    expect(result.results[0].analyzedStrings).toEqual(['ab', 'ac']);
    expect(Object.isFrozen(result.results[0])).toBe(true);
  });

  it('calls onStep once per recorded step', () => {
    const onStep = vi.fn();
    findProgressivePrefixes(BASIC, { onStep });
    expect(onStep).toHaveBeenCalledTimes(3);
    expect(onStep.mock.calls[1][0]).toMatchObject({ step: 2, commonPrefix: 'prefix_' });
  });

  it('attaches one performance record per step', () => {
    const result = findProgressivePrefixes(BASIC, { includePerformance: true });
    const records = result.performanceData ?? [];
    expect(records.map(r => [r.step, r.stringsCount])).toEqual([[1, 2], [2, 3], [3, 4]]);
    expect(records[0].memoryEstimate).toEqual({
      inputChars: 26,
      outputChars: 12,
      stringsCount: 2,
      estimatedBytes: 32 + 16 * 2 + 2 * (26 + 12)
    });

    const summary = result.performanceSummary;
    expect(summary?.totalStringsProcessed).toBe(9);
    const total = records.reduce((sum, r) => sum + r.executionTimeMs, 0);
    expect(summary?.totalExecutionTimeMs).toBeCloseTo(total, 3);
  });

  it('instruments the single-string case', () => {
    const result = findProgressivePrefixes(['only'], { includePerformance: true });
    expect(result.performanceData).toHaveLength(1);
    expect(result.performanceSummary?.totalStringsProcessed).toBe(1);
  });

  it('omits performance data on error', () => {
    const result = findProgressivePrefixes([], { includePerformance: true });
    expect(result.performanceData).toBeUndefined();
  });
});
