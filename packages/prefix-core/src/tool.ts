/**
 * Agent tool adapter: descriptor plus a validating entry point
 */

import { z } from 'zod';
import { ALGORITHM_IDS, DEFAULT_ALGORITHM } from './algorithms.js';
import { invalidInput } from './errors.js';
import { findProgressivePrefixes } from './progressive.js';
import type { RunResult } from './types.js';

const ToolInput = z.object({
  strings: z.array(z.string()),
  // any string, so unknown identifiers reach the engine's own error
  algorithm: z.string().nullish(),
  includePerformance: z.boolean().nullish(),
  // spelling used by snake_case agent hosts
  include_performance: z.boolean().nullish()
}).strict();

export type ToolInput = z.infer<typeof ToolInput>;
export type ToolInputName = 'strings' | 'algorithm' | 'includePerformance';

export interface ToolInputDescriptor {
  type: 'array' | 'string' | 'boolean';
  description: string;
  nullable?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputs: Record<ToolInputName, ToolInputDescriptor>;
  outputType: 'object';
}

export const PROGRESSIVE_PREFIX_TOOL: ToolDescriptor = {
  name: 'progressive_prefix_finder',
  description: 'Finds common prefixes progressively from a list of strings. Starts with the first 2 strings, then adds one at a time until all strings are processed.',
  inputs: {
    strings: { type: 'array', description: 'List of strings to analyze for common prefixes' },
    algorithm: {
      type: 'string',
      description: `Algorithm to use: ${ALGORITHM_IDS.map(id => `"${id}"`).join(', ')} (default: "${DEFAULT_ALGORITHM}")`,
      nullable: true
    },
    includePerformance: { type: 'boolean', description: 'Whether to include performance metrics (default: false)', nullable: true }
  },
  outputType: 'object'
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Run the progressive finder on an untyped tool payload. Always returns a
 * well-formed result; a payload of the wrong shape, or with keys the tool
 * does not know, becomes an `invalid_input` error.
 */
export function invokeProgressivePrefixTool(input: unknown): RunResult {
  const parsed = ToolInput.safeParse(input);
  if (!parsed.success) {
    return {
      results: [],
      totalSteps: 0,
      algorithmUsed: DEFAULT_ALGORITHM,
      summary: { initialStringsCount: 0, finalCommonPrefix: '', prefixLength: 0 },
      error: invalidInput(`Invalid tool input: ${describeIssues(parsed.error)}`)
    };
  }

  const { strings, algorithm, includePerformance, include_performance } = parsed.data;
  return findProgressivePrefixes(strings, {
    algorithm: algorithm ?? undefined,
    includePerformance: includePerformance ?? include_performance ?? undefined
  });
}
