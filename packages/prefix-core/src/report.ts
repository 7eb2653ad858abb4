/**
 * Plain-text rendering of run and comparison results
 */

import type { ComparisonReport } from './compare.js';
import type { RunResult } from './types.js';

export const PREVIEW_LIMIT = 3;

export function previewStrings(strings: readonly string[], limit = PREVIEW_LIMIT): string[] {
  const head = strings.slice(0, limit);
  return strings.length > limit ? [...head, '...'] : head;
}

export function formatRunResult(result: RunResult, options: { showAnalyzed?: boolean } = {}): string[] {
  if (result.error) return [`Error: ${result.error.message}`];

  const lines: string[] = [];
  for (const s of result.results) {
    lines.push(`Step ${s.step}: ${s.stringsCount} strings -> '${s.commonPrefix}'`);
    if (options.showAnalyzed) lines.push(`  analyzed: ${previewStrings(s.analyzedStrings).join(', ')}`);
  }

  lines.push(`Algorithm: ${result.algorithmUsed}`);
  lines.push(`Final common prefix: '${result.summary.finalCommonPrefix}'`);
  lines.push(`Prefix length: ${result.summary.prefixLength}`);

  const perf = result.performanceSummary;
  if (perf) {
    lines.push(`Total time: ${perf.totalExecutionTimeMs}ms`);
    lines.push(`Average time: ${perf.averageExecutionTimeMs}ms`);
    lines.push(`Peak memory estimate: ${perf.peakMemoryEstimateBytes} bytes`);
  }

  return lines;
}

export function formatComparison(report: ComparisonReport): string[] {
  if (report.error && report.error.kind !== 'internal_inconsistency') return [`Error: ${report.error.message}`];

  const lines: string[] = [];
  for (const id of report.algorithmsCompared) {
    const result = report.comparisonResults[id];
    const time = result.performanceSummary ? ` (${result.performanceSummary.totalExecutionTimeMs}ms)` : '';
    lines.push(`${id}: '${result.summary.finalCommonPrefix}'${time}`);
  }

  if (report.agreement) {
    lines.push('All algorithms agree');
  } else {
    for (const d of report.discrepancies) lines.push(`Discrepancy: ${d.message}`);
  }

  return lines;
}
