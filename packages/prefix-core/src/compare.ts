/**
 * Cross-algorithm comparison
 */

import { ALGORITHM_IDS } from './algorithms.js';
import { internalInconsistency, type ComparisonError } from './errors.js';
import { findProgressivePrefixes } from './progressive.js';
import type { AlgorithmId, RunResult } from './types.js';

export interface Discrepancy {
  step: number;                                       // 1-based step index; 0 when step counts differ
  prefixes: Partial<Record<AlgorithmId, string | null>>; // null where an algorithm produced no such step
  message: string;
}

export interface VisualizationData {
  performanceChart: Partial<Record<AlgorithmId, { step: number; timeMs: number }[]>>;
  memoryUsage: Partial<Record<AlgorithmId, { step: number; memoryBytes: number }[]>>;
  accuracyCheck: Partial<Record<AlgorithmId, string>>;
}

export interface ComparisonReport {
  algorithmsCompared: readonly AlgorithmId[];
  inputStringsCount: number;
  comparisonResults: Record<AlgorithmId, RunResult>;
  agreement: boolean;
  discrepancies: Discrepancy[];
  error?: ComparisonError;  // input error from the runs, else internal_inconsistency on disagreement
  visualization?: VisualizationData;
}

export interface CompareOptions {
  includeVisualization?: boolean;
}

/**
 * Check that every algorithm produced the same prefix at every step
 * @returns One entry per disagreement, empty when all runs agree
 */
export function findDiscrepancies(results: Record<AlgorithmId, RunResult>): Discrepancy[] {
  const discrepancies: Discrepancy[] = [];

  const counts = ALGORITHM_IDS.map(id => results[id].totalSteps);
  if (new Set(counts).size > 1) {
    discrepancies.push({
      step: 0,
      prefixes: {},
      message: `Step counts differ: ${ALGORITHM_IDS.map((id, i) => `${id}=${counts[i]}`).join(', ')}`
    });
  }

  const steps = Math.max(...counts);
  for (let i = 0; i < steps; i++) {
    const prefixes: Partial<Record<AlgorithmId, string | null>> = {};
    const seen = new Set<string | null>();
    for (const id of ALGORITHM_IDS) {
      const prefix = results[id].results[i]?.commonPrefix ?? null;
      prefixes[id] = prefix;
      seen.add(prefix);
    }
    if (seen.size > 1) {
      discrepancies.push({
        step: i + 1,
        prefixes,
        message: `Algorithms disagree at step ${i + 1}`
      });
    }
  }

  return discrepancies;
}

function visualize(results: Record<AlgorithmId, RunResult>): VisualizationData {
  const viz: VisualizationData = { performanceChart: {}, memoryUsage: {}, accuracyCheck: {} };

  for (const id of ALGORITHM_IDS) {
    const result = results[id];
    if (result.error || !result.performanceData) continue;
    viz.performanceChart[id] = result.performanceData.map(p => ({ step: p.step, timeMs: p.executionTimeMs }));
    viz.memoryUsage[id] = result.performanceData.map(p => ({ step: p.step, memoryBytes: p.memoryEstimate.estimatedBytes }));
    viz.accuracyCheck[id] = result.summary.finalCommonPrefix;
  }

  return viz;
}

/**
 * Run the progressive analysis once per algorithm over the same input, with
 * instrumentation on, and report whether they agree.
 */
export function compareAlgorithms(strings: readonly string[], options: CompareOptions = {}): ComparisonReport {
  const { includeVisualization = false } = options;

  const run = (algorithm: AlgorithmId) => findProgressivePrefixes(strings, { algorithm, includePerformance: true });
  return buildReport(strings.length, {
    character: run('character'),
    binary_search: run('binary_search'),
    trie: run('trie')
  }, includeVisualization);
}

/**
 * Assemble a comparison report from one run per algorithm
 */
export function buildReport(
  inputStringsCount: number,
  comparisonResults: Record<AlgorithmId, RunResult>,
  includeVisualization = false
): ComparisonReport {
  const discrepancies = findDiscrepancies(comparisonResults);
  const report: ComparisonReport = {
    algorithmsCompared: ALGORITHM_IDS,
    inputStringsCount,
    comparisonResults,
    agreement: discrepancies.length === 0,
    discrepancies
  };

  const failedRun = ALGORITHM_IDS.map(id => comparisonResults[id].error).find(e => e !== undefined);
  if (failedRun) {
    report.error = failedRun;
  } else if (discrepancies.length > 0) {
    report.error = internalInconsistency(discrepancies.map(d => d.step));
  }
  if (includeVisualization) report.visualization = visualize(comparisonResults);

  return report;
}
