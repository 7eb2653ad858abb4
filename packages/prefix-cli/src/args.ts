export type OutputFormat = 'pretty' | 'json' | 'text';

export interface FindOptions {
  algorithm?: string;
  performance: boolean;
  format: OutputFormat;
  verbose: boolean;
  keepBlank: boolean;
}

export interface CompareCliOptions {
  visualize: boolean;
  format: OutputFormat;
}

export class UsageError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'UsageError';
  }
}

function formatFlag(arg: string): OutputFormat | null {
  if (arg === '--json') return 'json';
  if (arg === '--text') return 'text';
  return null;
}

export function parseFindArgs(args: string[]): { inputs: string[]; options: FindOptions } {
  const options: FindOptions = {
    performance: false,
    format: 'pretty',
    verbose: false,
    keepBlank: false
  };

  const inputs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg === '--') {
      inputs.push(...args.slice(i + 1));
      break;
    }
    if (arg.startsWith('--')) {
      const format = formatFlag(arg);
      if (format) {
        options.format = format;
        i++;
        continue;
      }
      switch (arg) {
        case '--algorithm': {
          const value = args[++i];
          if (value === undefined) throw new UsageError('--algorithm needs a value');
          options.algorithm = value;
          break;
        }
        case '--performance':
          options.performance = true;
          break;
        case '--verbose':
          options.verbose = true;
          break;
        case '--keep-blank':
          options.keepBlank = true;
          break;
        default:
          throw new UsageError(`Unknown option: ${arg}`);
      }
    } else {
      inputs.push(arg);
    }
    i++;
  }

  return { inputs, options };
}

export function parseCompareArgs(args: string[]): { inputs: string[]; options: CompareCliOptions } {
  const options: CompareCliOptions = {
    visualize: false,
    format: 'pretty'
  };

  const inputs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];
    if (arg === '--') {
      inputs.push(...args.slice(i + 1));
      break;
    }
    if (arg.startsWith('--')) {
      const format = formatFlag(arg);
      if (format) {
        options.format = format;
      } else if (arg === '--visualize') {
        options.visualize = true;
      } else {
        throw new UsageError(`Unknown option: ${arg}`);
      }
    } else {
      inputs.push(arg);
    }
    i++;
  }

  return { inputs, options };
}
