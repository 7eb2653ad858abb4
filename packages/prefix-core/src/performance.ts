/**
 * Per-step timing and memory estimates
 */

import { performance } from 'node:perf_hooks';
import type { MemoryEstimate, PerformanceRecord, PerformanceSummary, PrefixFinder } from './types.js';

// Heuristic cost model: fixed overhead, a header per string, two bytes per code unit
export const BASE_OVERHEAD_BYTES = 32;
export const STRING_HEADER_BYTES = 16;
export const BYTES_PER_CHAR = 2;

export function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

/**
 * Estimate the footprint of one step from character counts alone
 * @param strings - Strings analyzed in the step
 * @param prefix - Prefix the step produced
 */
export function estimateMemory(strings: readonly string[], prefix: string): MemoryEstimate {
  let inputChars = 0;
  for (const s of strings) inputChars += s.length;
  const outputChars = prefix.length;

  return {
    inputChars,
    outputChars,
    stringsCount: strings.length,
    estimatedBytes: BASE_OVERHEAD_BYTES + STRING_HEADER_BYTES * strings.length + BYTES_PER_CHAR * (inputChars + outputChars)
  };
}

/**
 * Time a single algorithm call
 * @returns The prefix plus the step's performance record
 */
export function measure(
  step: number,
  strings: readonly string[],
  finder: PrefixFinder
): { prefix: string; record: PerformanceRecord } {
  const start = performance.now();
  const prefix = finder(strings);
  const elapsed = performance.now() - start;

  return {
    prefix,
    record: {
      step,
      stringsCount: strings.length,
      executionTimeMs: round4(elapsed),
      memoryEstimate: estimateMemory(strings, prefix)
    }
  };
}

export function summarizePerformance(records: readonly PerformanceRecord[]): PerformanceSummary | undefined {
  if (records.length === 0) return undefined;

  let total = 0;
  let max = -Infinity;
  let min = Infinity;
  let peak = 0;
  let processed = 0;

  for (const r of records) {
    total += r.executionTimeMs;
    max = Math.max(max, r.executionTimeMs);
    min = Math.min(min, r.executionTimeMs);
    peak = Math.max(peak, r.memoryEstimate.estimatedBytes);
    processed += r.stringsCount;
  }

  return {
    totalExecutionTimeMs: round4(total),
    averageExecutionTimeMs: round4(total / records.length),
    maxExecutionTimeMs: round4(max),
    minExecutionTimeMs: round4(min),
    peakMemoryEstimateBytes: peak,
    totalStringsProcessed: processed
  };
}
