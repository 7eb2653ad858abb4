import {
  ALGORITHM_IDS,
  compareAlgorithms,
  findProgressivePrefixes,
  formatComparison,
  formatRunResult,
  generateUsageExamples,
  invokeProgressivePrefixTool,
  type RunResult
} from '@progressive-prefix/core';
import { parseCompareArgs, parseFindArgs, UsageError, type FindOptions, type OutputFormat } from './args.js';
import { expandInputs, readStrings } from './inputs.js';

export interface Io {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: Io = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export const USAGE = `Usage:
  prefix find <strings...> [options]
  prefix scan <folder-or-files...> [options]
  prefix compare <strings...> [--visualize] [--json | --text]
  prefix examples [--json]
  prefix tool '<json payload>'

Find/scan options:
  --algorithm <id>        One of: ${ALGORITHM_IDS.join(', ')} (default: character)
  --performance           Include per-step timing and memory estimates
  --verbose               Print each step to stderr as it completes
  --keep-blank            Scan only: keep blank lines as empty strings
  --json                  Compact JSON output (default: pretty-printed)
  --text                  Human-readable summary
  --                      Treat every following argument as a string

Scan reads one string per line, skipping blank lines unless --keep-blank is given;
folders are searched for *.txt files.`;

function emit(io: Io, format: OutputFormat, value: unknown, text: () => string[]) {
  if (format === 'text') {
    for (const line of text()) io.out(line);
  } else if (format === 'json') {
    io.out(JSON.stringify(value));
  } else {
    io.out(JSON.stringify(value, null, 2));
  }
}

function runFind(io: Io, strings: string[], options: FindOptions): number {
  const result: RunResult = findProgressivePrefixes(strings, {
    algorithm: options.algorithm,
    includePerformance: options.performance,
    onStep: options.verbose ? s => io.err(`step ${s.step}: ${s.stringsCount} strings -> '${s.commonPrefix}'`) : undefined
  });
  emit(io, options.format, result, () => formatRunResult(result, { showAnalyzed: options.verbose }));
  return result.error ? 1 : 0;
}

/**
 * Dispatch one CLI invocation
 * @param argv - Arguments after the executable and script path
 * @returns Process exit code
 */
export function runCommand(argv: string[], io: Io = consoleIo): number {
  const [cmd, ...args] = argv;
  if (!cmd || cmd === 'help' || cmd === '--help') {
    io.out(USAGE);
    return cmd ? 0 : 1;
  }

  try {
    if (cmd === 'find') {
      const { inputs, options } = parseFindArgs(args);
      return runFind(io, inputs, options);
    }

    if (cmd === 'scan') {
      const { inputs, options } = parseFindArgs(args);
      if (inputs.length === 0) throw new UsageError('scan needs at least one file or folder');
      return runFind(io, readStrings(expandInputs(inputs), { keepBlank: options.keepBlank }), options);
    }

    if (cmd === 'compare') {
      const { inputs, options } = parseCompareArgs(args);
      const report = compareAlgorithms(inputs, { includeVisualization: options.visualize });
      emit(io, options.format, report, () => formatComparison(report));
      if (!report.agreement) io.err(`Algorithms disagree at ${report.discrepancies.length} point(s)`);
      return report.error || !report.agreement ? 1 : 0;
    }

    if (cmd === 'examples') {
      const compact = args.includes('--json');
      const examples = generateUsageExamples();
      io.out(compact ? JSON.stringify(examples) : JSON.stringify(examples, null, 2));
      return 0;
    }

    if (cmd === 'tool') {
      const payload = args[0];
      if (payload === undefined) throw new UsageError('tool needs a JSON payload');
      let input: unknown;
      try {
        input = JSON.parse(payload);
      } catch (e) {
        throw new UsageError(`Payload is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
      }
      const result = invokeProgressivePrefixTool(input);
      io.out(JSON.stringify(result, null, 2));
      return result.error ? 1 : 0;
    }
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(e.message);
      io.err(USAGE);
      return 1;
    }
    throw e;
  }

  io.err(`Unknown command: ${cmd}`);
  io.err(USAGE);
  return 1;
}
