/**
 * Canonical usage examples, for documentation and test seeding
 */

import type { RunErrorKind } from './types.js';

export interface UsageCase {
  description: string;
  input: readonly string[];
  expectedFinalPrefix: string;
  expectedError?: RunErrorKind;
}

export interface UsageExample extends UsageCase {
  useCase: string;
}

export interface UsageExamples {
  basicUsage: UsageExample;
  filePaths: UsageExample;
  urls: UsageExample;
  codePatterns: UsageExample;
  edgeCases: { description: string; cases: readonly UsageCase[] };
}

const EXAMPLES: UsageExamples = {
  basicUsage: {
    description: 'Basic progressive prefix finding',
    input: ['prefix_test_1', 'prefix_test_2', 'prefix_demo', 'prefix_example'],
    expectedFinalPrefix: 'prefix_',
    useCase: 'Progressive narrowing of a shared prefix'
  },
  filePaths: {
    description: 'Finding common directory paths',
    input: ['/home/user/documents/file1.txt', '/home/user/documents/file2.txt', '/home/user/downloads/file3.txt'],
    expectedFinalPrefix: '/home/user/do',
    useCase: 'File path analysis'
  },
  urls: {
    description: 'URL prefix extraction',
    input: ['https://example.com/api/v1/users', 'https://example.com/api/v1/posts', 'https://example.com/api/v2/users'],
    expectedFinalPrefix: 'https://example.com/api/v',
    useCase: 'Web crawling and analysis'
  },
  codePatterns: {
    description: 'Identifying common naming patterns',
    input: ['getUserData', 'getUserInfo', 'getUserProfile', 'getPostData'],
    expectedFinalPrefix: 'get',
    useCase: 'Code refactoring'
  },
  edgeCases: {
    description: 'Edge case handling',
    cases: [
      { description: 'Empty list', input: [], expectedFinalPrefix: '', expectedError: 'empty_input' },
      { description: 'Single string', input: ['single'], expectedFinalPrefix: 'single' },
      { description: 'No common prefix', input: ['abc', 'xyz'], expectedFinalPrefix: '' },
      { description: 'Empty string in list', input: ['', 'abc'], expectedFinalPrefix: '' }
    ]
  }
};

export function generateUsageExamples(): UsageExamples {
  return structuredClone(EXAMPLES);
}
