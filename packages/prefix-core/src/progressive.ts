/**
 * Progressive prefix analysis: two strings first, then one more per step
 */

import { ALGORITHMS, ALGORITHM_IDS, DEFAULT_ALGORITHM, isAlgorithmId } from './algorithms.js';
import { emptyInput, unknownAlgorithm } from './errors.js';
import { measure, summarizePerformance } from './performance.js';
import type { PerformanceRecord, PrefixFinder, RunError, RunResult, Step } from './types.js';

export interface ProgressiveOptions {
  algorithm?: string;            // One of ALGORITHM_IDS (default: 'character')
  includePerformance?: boolean;  // Attach per-step timing and memory estimates
  onStep?: (step: Step) => void; // Called after each step is recorded
}

function failed(strings: readonly string[], algorithm: string, error: RunError): RunResult {
  return {
    results: [],
    totalSteps: 0,
    algorithmUsed: algorithm,
    summary: { initialStringsCount: strings.length, finalCommonPrefix: '', prefixLength: 0 },
    error
  };
}

function makeStep(step: number, analyzed: readonly string[], commonPrefix: string): Step {
  return Object.freeze({
    step,
    stringsCount: analyzed.length,
    commonPrefix,
    analyzedStrings: Object.freeze(analyzed.slice())
  });
}

/**
 * Find the common prefix of `strings[0..k)` for k = 2..n.
 *
 * Malformed input (an empty list, an unknown algorithm) comes back as a
 * result with zero steps and an `error` field; this function does not throw
 * for it. A single string yields one step whose prefix is that string.
 *
 * @param strings - Ordered input; never mutated
 * @param options - Algorithm choice and instrumentation
 */
export function findProgressivePrefixes(
  strings: readonly string[],
  options: ProgressiveOptions = {}
): RunResult {
  const {
    algorithm = DEFAULT_ALGORITHM,
    includePerformance = false,
    onStep
  } = options;

  if (strings.length === 0) return failed(strings, algorithm, emptyInput());
  if (!isAlgorithmId(algorithm)) return failed(strings, algorithm, unknownAlgorithm(algorithm, ALGORITHM_IDS));

  const finder: PrefixFinder = ALGORITHMS[algorithm];
  const results: Step[] = [];
  const performanceData: PerformanceRecord[] = [];

  const record = (index: number, analyzed: readonly string[]) => {
    let prefix: string;
    if (includePerformance) {
      const timed = measure(index, analyzed, finder);
      performanceData.push(timed.record);
      prefix = timed.prefix;
    } else {
      prefix = finder(analyzed);
    }
    const step = makeStep(index, analyzed, prefix);
    results.push(step);
    onStep?.(step);
  };

  if (strings.length === 1) {
    record(1, strings);
  } else {
    for (let k = 2; k <= strings.length; k++) {
      record(k - 1, strings.slice(0, k));
    }
  }

  const last = results[results.length - 1];
  const response: RunResult = {
    results,
    totalSteps: results.length,
    algorithmUsed: algorithm,
    summary: {
      initialStringsCount: strings.length,
      finalCommonPrefix: last.commonPrefix,
      prefixLength: last.commonPrefix.length
    }
  };

  if (includePerformance) {
    response.performanceData = performanceData;
    response.performanceSummary = summarizePerformance(performanceData);
  }

  return response;
}
