import type { LogLevel } from '@ocrflow/logger';

import { OCR_ENGINE } from '@ocrflow/batch-engine';
import { isLogLevel } from '@ocrflow/logger';
import { parseArgs } from 'node:util';
import { z } from 'zod';

export interface ProcessArgs {
  inputs: string[];
  output: string;
  includeImages?: boolean;
  concurrency?: number;
  timeoutMs?: number;
  batchTimeoutMs?: number;
  maxAttempts?: number;
  recursive: boolean;
  allowEmpty: boolean;
  model?: string;
  verbose: boolean;
  logFile?: string;
}

export interface ServeArgs {
  host?: string;
  port?: number;
  logLevel?: LogLevel;
  logFile?: string;
}

export type Command =
  | { name: 'process'; args: ProcessArgs }
  | { name: 'serve'; args: ServeArgs }
  | { name: 'help' };

/**
 * Invalid command line. The message is shown above the usage text.
 */
export class UsageError extends Error {
  public readonly name = 'UsageError';
}

export const USAGE = `Usage: ocrflow <command> [options]

Commands:
  process   Run OCR over files, directories or URLs and write a JSON report
  serve     Start the REST API

process options:
  -i, --input <path|url>     Input file, directory or URL (repeatable)
  -o, --output <file>        Report file to write
      --include-images       Return extracted images base64-encoded
      --model <name>         OCR model
      --concurrency <n>      Maximum concurrent backend calls
      --timeout-ms <n>       Timeout for one backend call
      --batch-timeout-ms <n> Deadline for the whole batch
      --max-attempts <n>     Attempts per document, including the first
      --recursive            Descend into subdirectories
      --allow-empty          Succeed when no documents are found
  -v, --verbose              Debug logging
  -l, --log-file <file>      Also write logs to this file

serve options:
      --host <host>          Interface to bind (default 0.0.0.0)
      --port <port>          Port to listen on (default 8000)
      --log-level <level>    debug, info, warn or error
  -l, --log-file <file>      Also write logs to this file
`;

const PROCESS_OPTIONS = {
  input: { type: 'string', short: 'i', multiple: true },
  output: { type: 'string', short: 'o' },
  'include-images': { type: 'boolean' },
  model: { type: 'string' },
  concurrency: { type: 'string' },
  'timeout-ms': { type: 'string' },
  'batch-timeout-ms': { type: 'string' },
  'max-attempts': { type: 'string' },
  recursive: { type: 'boolean', default: false },
  'allow-empty': { type: 'boolean', default: false },
  verbose: { type: 'boolean', short: 'v', default: false },
  'log-file': { type: 'string', short: 'l' },
} as const;

const SERVE_OPTIONS = {
  host: { type: 'string' },
  port: { type: 'string' },
  'log-level': { type: 'string' },
  'log-file': { type: 'string', short: 'l' },
} as const;

const positiveInteger = z.coerce.number().int().positive();
const milliseconds = positiveInteger.max(OCR_ENGINE.MAX_TIMER_DELAY_MS);
const portNumber = z.coerce.number().int().min(0).max(65535);

/**
 * Parse `ocrflow` arguments (without the node and script paths).
 *
 * @throws UsageError on unknown commands, unknown options or invalid values
 */
export function parseCommand(argv: string[]): Command {
  if (argv.length === 0) {
    throw new UsageError('No command given');
  }

  const [name, ...rest] = argv;

  switch (name) {
    case 'process':
      return { name, args: parseProcessArgs(rest) };
    case 'serve':
      return { name, args: parseServeArgs(rest) };
    case 'help':
    case '--help':
    case '-h':
      return { name: 'help' };
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}

function parseProcessArgs(args: string[]): ProcessArgs {
  const { values } = parseOrThrow(() =>
    parseArgs({ args, options: PROCESS_OPTIONS, strict: true }),
  );

  const inputs = values.input ?? [];
  if (inputs.length === 0) {
    throw new UsageError('process requires at least one --input');
  }
  if (!values.output) {
    throw new UsageError('process requires --output');
  }

  return {
    inputs,
    output: values.output,
    includeImages: values['include-images'],
    model: values.model,
    concurrency: parseNumber(
      '--concurrency',
      values.concurrency,
      positiveInteger,
    ),
    timeoutMs: parseNumber(
      '--timeout-ms',
      values['timeout-ms'],
      milliseconds,
    ),
    batchTimeoutMs: parseNumber(
      '--batch-timeout-ms',
      values['batch-timeout-ms'],
      milliseconds,
    ),
    maxAttempts: parseNumber(
      '--max-attempts',
      values['max-attempts'],
      positiveInteger,
    ),
    recursive: values.recursive ?? false,
    allowEmpty: values['allow-empty'] ?? false,
    verbose: values.verbose ?? false,
    logFile: values['log-file'],
  };
}

function parseServeArgs(args: string[]): ServeArgs {
  const { values } = parseOrThrow(() =>
    parseArgs({ args, options: SERVE_OPTIONS, strict: true }),
  );

  const logLevel = values['log-level'];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new UsageError(`Invalid value for --log-level: ${logLevel}`);
  }

  return {
    host: values.host,
    port: parseNumber('--port', values.port, portNumber),
    logLevel,
    logFile: values['log-file'],
  };
}

function parseOrThrow<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new UsageError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

function parseNumber(
  flag: string,
  value: string | undefined,
  schema: z.ZodNumber,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UsageError(`Invalid value for ${flag}: ${value}`);
  }
  return result.data;
}
