export type AlgorithmId = 'character' | 'binary_search' | 'trie';
export type PrefixFinder = (strings: readonly string[]) => string;

export interface Step { step:number; stringsCount:number; commonPrefix:string; analyzedStrings:readonly string[]; }
export interface Summary { initialStringsCount:number; finalCommonPrefix:string; prefixLength:number; }

export interface MemoryEstimate {
  inputChars: number;
  outputChars: number;
  stringsCount: number;
  estimatedBytes: number;
}

export interface PerformanceRecord {
  step: number;
  stringsCount: number;
  executionTimeMs: number;
  memoryEstimate: MemoryEstimate;
}

export interface PerformanceSummary {
  totalExecutionTimeMs: number;
  averageExecutionTimeMs: number;
  maxExecutionTimeMs: number;
  minExecutionTimeMs: number;
  peakMemoryEstimateBytes: number;
  totalStringsProcessed: number;
}

export type RunErrorKind = 'empty_input' | 'unknown_algorithm' | 'invalid_input';

export interface RunError {
  kind: RunErrorKind;
  message: string;
  validAlgorithms?: readonly AlgorithmId[];
}

export interface RunResult {
  results: Step[];
  totalSteps: number;
  algorithmUsed: string;   // raw identifier, echoed even when unknown
  summary: Summary;
  performanceData?: PerformanceRecord[];
  performanceSummary?: PerformanceSummary;
  error?: RunError;
}
