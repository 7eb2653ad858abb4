import type { AlgorithmId, RunError, RunErrorKind } from './types.js';

export type PrefixErrorKind = RunErrorKind | 'internal_inconsistency';

/**
 * Error carrying a `kind` code that callers can branch on.
 *
 *       try {
 *         character(strings);
 *       } catch (e) {
 *         if (e instanceof PrefixError && e.kind === 'empty_input') {
 *           console.error('nothing to compare');
 *         }
 *       }
 */
export class PrefixError<K extends PrefixErrorKind = PrefixErrorKind> extends Error {
  constructor(readonly kind: K, msg: string) {
    super(msg);
    this.name = 'PrefixError';
  }
}

export const EMPTY_INPUT_MESSAGE = 'Empty string list provided';

export function emptyInput(): RunError {
  return { kind: 'empty_input', message: EMPTY_INPUT_MESSAGE };
}

export function unknownAlgorithm(id: string, valid: readonly AlgorithmId[]): RunError {
  return {
    kind: 'unknown_algorithm',
    message: `Unknown algorithm: ${id}. Valid algorithms: ${valid.join(', ')}`,
    validAlgorithms: valid
  };
}

export function invalidInput(message: string): RunError {
  return { kind: 'invalid_input', message };
}

export interface ComparisonError {
  kind: PrefixErrorKind;
  message: string;
  validAlgorithms?: readonly AlgorithmId[];
  steps?: number[];
}

/**
 * Algorithms disagreed; `steps` lists the affected step indexes (0 for a
 * step-count mismatch)
 */
export function internalInconsistency(steps: number[]): ComparisonError {
  return {
    kind: 'internal_inconsistency',
    message: `Algorithms disagree at ${steps.length} point(s): steps ${steps.join(', ')}`,
    steps
  };
}
