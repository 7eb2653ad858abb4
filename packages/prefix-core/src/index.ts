export * from './types.js';
export * from './errors.js';
export { PrefixTrie, build, type NodeId } from './trie.js';
export { character, binarySearch, trie, ALGORITHMS, ALGORITHM_IDS, DEFAULT_ALGORITHM, isAlgorithmId } from './algorithms.js';
export { estimateMemory, measure, summarizePerformance } from './performance.js';
export { findProgressivePrefixes, type ProgressiveOptions } from './progressive.js';
export { compareAlgorithms, buildReport, findDiscrepancies, type ComparisonReport, type CompareOptions, type Discrepancy, type VisualizationData } from './compare.js';
export { generateUsageExamples, type UsageCase, type UsageExample, type UsageExamples } from './examples.js';
export { PROGRESSIVE_PREFIX_TOOL, invokeProgressivePrefixTool, type ToolDescriptor, type ToolInput, type ToolInputDescriptor, type ToolInputName } from './tool.js';
export { formatRunResult, formatComparison, previewStrings } from './report.js';
