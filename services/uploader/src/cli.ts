import type { Readable } from 'stream';
import { loadArchiveConfig } from './lib/config.js';
import { ColdpipeError, UsageError, describeError } from './lib/errors.js';
import { getLogger, setLogLevel } from './lib/logger.js';
import {
  stdinArchiveJob,
  type StdinArchiveRunOptions,
  type StdinArchiveRunResult,
} from './jobs/stdinArchiveJob.js';

export interface CliOptions {
  confPath: string;
  name: string;
  description: string;
  timeoutSeconds?: number;
  verbose: boolean;
  help: boolean;
}

export const DEFAULT_DESCRIPTION = 'Uploaded from standard input';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: OutputStream;
  stderr: OutputStream;
}

// Test seams for the FTP client and the poll clock
export type JobOverrides = Pick<StdinArchiveRunOptions, 'createFtpClient' | 'sleep' | 'now'>;

export function usage(): string {
  return [
    'Usage: coldpipe --conf <path> [options] < payload',
    '',
    'Options:',
    '  --conf <path>          YAML file with api_token, api_url, safe_name, platform_id (required)',
    '  --name <string>        Archive name (default stdin-<timestamp>)',
    `  --description <text>   Archive description (default "${DEFAULT_DESCRIPTION}")`,
    '  --timeout <seconds>    Give up waiting for the archive after this long',
    '  --verbose              Log API requests and responses',
    '  -h, --help             Show this help',
  ].join('\n');
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new UsageError(`Invalid value for --timeout: ${value}`);
  }
  return seconds;
}

export function parseArgs(argv: string[], now: Date = new Date()): CliOptions {
  let confPath: string | undefined;
  const options: Omit<CliOptions, 'confPath'> = {
    name: `stdin-${now.toISOString()}`,
    description: DEFAULT_DESCRIPTION,
    verbose: false,
    help: false,
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--verbose') {
      options.verbose = true;
      continue;
    }

    if (arg === '--conf' || arg === '--name' || arg === '--description' || arg === '--timeout') {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      index += 1;

      if (arg === '--conf') confPath = next;
      else if (arg === '--name') options.name = next;
      else if (arg === '--description') options.description = next;
      else options.timeoutSeconds = parseSeconds(next);
      continue;
    }

    throw new UsageError(`Unknown argument: ${arg}`);
  }

  if (options.help) {
    return { ...options, confPath: confPath ?? '' };
  }
  if (!confPath) {
    throw new UsageError('Missing required option --conf');
  }

  return { ...options, confPath };
}

/**
 * Parse arguments, load the configuration and run the archive job against
 * `source`. Resolves with null when only the help text was printed.
 */
export async function main(
  argv: string[],
  source: Readable,
  stdout: OutputStream = process.stdout,
  overrides: JobOverrides = {}
): Promise<StdinArchiveRunResult | null> {
  const options = parseArgs(argv);

  if (options.help) {
    stdout.write(`${usage()}\n`);
    return null;
  }

  if (options.verbose) {
    setLogLevel('debug');
  }

  const config = await loadArchiveConfig(options.confPath);
  getLogger().debug({ confPath: options.confPath, apiUrl: config.apiUrl }, 'Configuration loaded');

  return stdinArchiveJob.run({
    config,
    name: options.name,
    description: options.description,
    source,
    timeoutMs: options.timeoutSeconds === undefined ? undefined : options.timeoutSeconds * 1000,
    ...overrides,
  });
}

/**
 * Run `main` and map the outcome to an exit code: 0 on success, 2 on a usage
 * error (printed with the usage text), 1 on anything else (logged).
 */
export async function runCli(
  argv: string[],
  source: Readable,
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
  overrides: JobOverrides = {}
): Promise<number> {
  try {
    await main(argv, source, io.stdout, overrides);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ColdpipeError && err.code === 'USAGE_ERROR') {
      io.stderr.write(`${err.message}\n\n${usage()}\n`);
      return EXIT_USAGE;
    }

    getLogger().error({ err }, describeError(err));
    return EXIT_FAILURE;
  }
}
