/**
 * countme-trim-raw command line
 *
 * Parses arguments with node:util parseArgs and maps the outcome of a run to
 * an exit status:
 *
 *   0  trimmed, reported, or printed help/version
 *   1  fatal error (store failure, unexpected exception)
 *   2  invalid arguments; no database was opened
 *   3  interrupted during the warning countdown; nothing was deleted
 */

import { parseArgs } from 'node:util';
import { config } from './config';
import { DEFAULT_KEEP_WEEKS, WARN_SECONDS } from './config/constants';
import { logger } from './config/logger';
import { ArgumentError, isTrimInterrupted } from './errors';
import { TrimOrchestrator } from './services/trim-orchestrator';
import type { RetentionPolicy } from './services/trim-window-planner';

export const PROG = 'countme-trim-raw';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 3;

const USAGE = `usage: ${PROG} [-h] [--version] [--read-write | --noop] [--oldest-week] [--keep N] [--vacuum] sqlite`;

const HELP = `${USAGE}

Trim old entries from the countme raw database.

positional arguments:
  sqlite          Path to the raw database (created if absent)

options:
  -h, --help      show this help message and exit
  --version       show program's version number and exit
  --read-write    Actually delete data, after a ${WARN_SECONDS} second warning
  --noop          Only report what would be deleted (default)
  --oldest-week   Trim only the oldest week of data, ignoring --keep
  --keep N        Number of recent weeks to keep (default: ${DEFAULT_KEEP_WEEKS})
  --vacuum        Run VACUUM after deleting (with --read-write only)`;

export interface TrimArgs {
  sqlite: string;
  rw: boolean;
  oldestWeek: boolean;
  keep: number;
  vacuum: boolean;
}

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'trim'; args: TrimArgs };

export function positiveInt(value: string): number {
  const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ArgumentError(`invalid positive integer value: '${value}'`);
  }
  return parsed;
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', default: false },
        'read-write': { type: 'boolean', default: false },
        noop: { type: 'boolean', default: false },
        'oldest-week': { type: 'boolean', default: false },
        keep: { type: 'string' },
        vacuum: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error: unknown) {
    throw new ArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): ParsedCommand {
  const { values, positionals } = parseRaw(argv);

  if (values.help) {
    return { command: 'help' };
  }
  if (values.version) {
    return { command: 'version' };
  }

  if (positionals.length === 0) {
    throw new ArgumentError('the following arguments are required: sqlite');
  }
  if (positionals.length > 1) {
    throw new ArgumentError(`unrecognized arguments: ${positionals.slice(1).join(' ')}`);
  }

  return {
    command: 'trim',
    args: {
      sqlite: positionals[0],
      rw: values['read-write'] === true && values.noop !== true,
      oldestWeek: values['oldest-week'] === true,
      keep: values.keep === undefined ? DEFAULT_KEEP_WEEKS : positiveInt(values.keep),
      vacuum: values.vacuum === true,
    },
  };
}

export interface CliDeps {
  orchestrator?: Pick<TrimOrchestrator, 'run'>;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  signal?: AbortSignal;
}

/**
 * Run the CLI and resolve to the process exit status.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let parsed: ParsedCommand;
  try {
    parsed = parseCliArgs(argv);
  } catch (error: unknown) {
    if (error instanceof ArgumentError) {
      stderr(USAGE);
      stderr(`${PROG}: error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (parsed.command === 'help') {
    stdout(HELP);
    return EXIT_OK;
  }
  if (parsed.command === 'version') {
    stdout(`${PROG} ${config.service.version}`);
    return EXIT_OK;
  }

  const { args } = parsed;
  const policy: RetentionPolicy = { keepWeeks: args.keep, includeOldestWeek: args.oldestWeek };
  const orchestrator = deps.orchestrator ?? new TrimOrchestrator({ write: stdout });

  try {
    await orchestrator.run({
      sqlitePath: args.sqlite,
      policy,
      readWrite: args.rw,
      vacuum: args.vacuum,
      signal: deps.signal,
    });
    return EXIT_OK;
  } catch (error: unknown) {
    if (isTrimInterrupted(error)) {
      logger.warn('CLI: Trim interrupted, nothing deleted', { sqlite: args.sqlite });
      stderr('Interrupted.');
      return EXIT_INTERRUPTED;
    }
    logger.error('CLI: Trim failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    stderr(`${PROG}: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}
