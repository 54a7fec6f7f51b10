/**
 * Command-line arguments for the organizer.
 */

import path from 'path';
import { parseArgs } from 'util';
import { DEFAULT_REPORT_FILENAME, config } from '@docsort/shared';
import type { TransferMode } from './materializer';

export const USAGE = `Usage: docsort --source <dir> --dest <dir> --config <file> [options]

Options:
  --source <dir>         Directory of documents to classify (searched recursively)
  --dest <dir>           Destination root; files are placed under <dest>/<category>/
  --config <file>        Category configuration (JSON)
  --report <file>        Report path (default: <dest>/${DEFAULT_REPORT_FILENAME})
  --concurrency <n>      Documents processed in parallel (default: WORKER_CONCURRENCY or 4)
  --move                 Move files instead of copying them
  --dry-run              Decide and report without placing any file
  --no-semantic          Never compute embeddings; rules only
  --metrics-file <file>  Write Prometheus metrics to this file after the run
  -h, --help             Show this help`;

/** Invalid command line; the CLI exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

export interface CliOptions {
  help: boolean;
  source: string;
  destination: string;
  configPath: string;
  reportPath: string;
  concurrency: number;
  mode: TransferMode;
  dryRun: boolean;
  semantic: boolean;
  metricsFile: string | null;
}

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value.trim() === '') {
    throw new UsageError(`Missing required option ${flag}`);
  }
  return path.resolve(value);
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: false,
      strict: true,
      options: {
        source: { type: 'string' },
        dest: { type: 'string' },
        config: { type: 'string' },
        report: { type: 'string' },
        concurrency: { type: 'string' },
        move: { type: 'boolean', default: false },
        'dry-run': { type: 'boolean', default: false },
        'no-semantic': { type: 'boolean', default: false },
        'metrics-file': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseFlags(argv);

  if (values.help) {
    return {
      help: true,
      source: '',
      destination: '',
      configPath: '',
      reportPath: '',
      concurrency: config.workerConcurrency,
      mode: 'copy',
      dryRun: false,
      semantic: true,
      metricsFile: null,
    };
  }

  const source = required(values.source, '--source');
  const destination = required(values.dest, '--dest');
  const configPath = required(values.config, '--config');

  let concurrency = config.workerConcurrency;
  if (values.concurrency !== undefined) {
    concurrency = Number(values.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new UsageError(`--concurrency must be a positive integer (got "${values.concurrency}")`);
    }
  }

  return {
    help: false,
    source,
    destination,
    configPath,
    reportPath: values.report ? path.resolve(values.report) : path.join(destination, DEFAULT_REPORT_FILENAME),
    concurrency,
    mode: values.move ? 'move' : 'copy',
    dryRun: values['dry-run'] ?? false,
    semantic: !(values['no-semantic'] ?? false),
    metricsFile: values['metrics-file'] ? path.resolve(values['metrics-file']) : null,
  };
}
