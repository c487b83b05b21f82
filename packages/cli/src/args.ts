import { DEFAULT_BATCH_SIZE } from '@nem12sql/sql';

/** Bad command-line invocation. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { readonly kind: 'help' }
  | {
      readonly kind: 'run';
      /** Path to the NEM12 file, or `-` for stdin. */
      readonly inputPath: string;
      /** Output file; stdout when omitted. */
      readonly outputPath?: string;
      readonly batchSize: number;
    };

export const USAGE = `Usage:
  nem12-sql <input_file> [--output <output_file>] [--batch-size <size>]

Parse a NEM12 meter data file and write INSERT statements for the meter_readings table.

Options:
  -o, --output <file>      Write SQL to <file> instead of stdout
  -b, --batch-size <size>  Rows per INSERT statement (default: ${String(DEFAULT_BATCH_SIZE)})
  -h, --help               Show this help

Use - as <input_file> to read from stdin.

Examples:
  nem12-sql sample_data.csv
  nem12-sql sample_data.csv --output meter_readings.sql
  nem12-sql large_file.csv -o output.sql -b 5000
`;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse CLI arguments (without the node executable and script path).
 *
 * The batch size is only checked for being an integer here; the generator
 * decides whether its value is acceptable.
 *
 * @throws UsageError on unknown flags, missing values or a missing input file.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let inputPath: string | undefined;
  let outputPath: string | undefined;
  let batchSize = DEFAULT_BATCH_SIZE;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const [flag, inlineValue] = splitInlineValue(arg);
    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const value = argv[i + 1];
      if (value === undefined) throw new UsageError(`Option ${flag} requires a value`);
      i++;
      return value;
    };

    switch (flag) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-o':
      case '--output':
        outputPath = takeValue();
        break;
      case '-b':
      case '--batch-size':
        batchSize = parseBatchSize(takeValue());
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (inputPath !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        inputPath = arg;
    }
  }

  if (inputPath === undefined) {
    throw new UsageError('Missing input file');
  }

  return outputPath === undefined
    ? { kind: 'run', inputPath, batchSize }
    : { kind: 'run', inputPath, outputPath, batchSize };
}

function splitInlineValue(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) return [arg, undefined];
  const equals = arg.indexOf('=');
  return equals === -1 ? [arg, undefined] : [arg.slice(0, equals), arg.slice(equals + 1)];
}

function parseBatchSize(value: string): number {
  if (!INTEGER_PATTERN.test(value.trim())) {
    throw new UsageError(`Invalid batch size: '${value}'`);
  }
  return Number.parseInt(value.trim(), 10);
}
