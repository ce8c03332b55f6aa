import type { LoggerMethods, LogLevel } from '@ocrflow/logger';

import { ConfigurationError, ResolverError } from '@ocrflow/batch-engine';
import { createLogger } from '@ocrflow/logger';

import type { Command } from './commands/parse-args';
import type { BackendFactory } from './config/engine-settings';
import type { AppEnv } from './config/env';

import { USAGE, UsageError, parseCommand } from './commands/parse-args';
import {
  EXIT_ERROR,
  EXIT_OK,
  runProcessCommand,
} from './commands/process-command';
import { runServeCommand } from './commands/serve-command';
import { createMistralBackend } from './config/engine-settings';
import { loadEnv } from './config/env';

interface LoggerSettings {
  level: LogLevel;
  filePath?: string;
}

export interface MainDeps {
  env?: NodeJS.ProcessEnv;
  createBackend?: BackendFactory;
  /** Builds the logger once the level and log file are known */
  createLogger?: (options: LoggerSettings) => LoggerMethods;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  waitForShutdown?: () => Promise<void>;
}

/**
 * Run the `ocrflow` command line and return the process exit code.
 */
export async function main(
  argv: string[],
  deps: MainDeps = {},
): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const makeLogger =
    deps.createLogger ??
    ((options: LoggerSettings) => createLogger({ name: 'ocrflow', ...options }));

  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_ERROR;
    }
    throw error;
  }

  if (command.name === 'help') {
    stdout(USAGE);
    return EXIT_OK;
  }

  let env: AppEnv;
  try {
    env = loadEnv(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr(`${error.message}\n`);
      return EXIT_ERROR;
    }
    throw error;
  }

  const createBackend = deps.createBackend ?? createMistralBackend;

  if (command.name === 'serve') {
    const { args } = command;
    const logger = makeLogger({
      level: args.logLevel ?? env.LOG_LEVEL,
      filePath: args.logFile,
    });
    try {
      return await runServeCommand(args, {
        env,
        logger,
        createBackend,
        waitForShutdown: deps.waitForShutdown,
      });
    } catch (error) {
      logger.error('[ocrflow] Server failed:', error);
      return EXIT_ERROR;
    }
  }

  const { args } = command;
  const logger = makeLogger({
    level: args.verbose ? 'debug' : env.LOG_LEVEL,
    filePath: args.logFile,
  });
  try {
    return await runProcessCommand(args, { env, logger, createBackend });
  } catch (error) {
    if (error instanceof ResolverError || error instanceof ConfigurationError) {
      logger.error(`[ocrflow] ${error.message}`);
    } else {
      logger.error('[ocrflow] Unexpected error:', error);
    }
    return EXIT_ERROR;
  }
}
