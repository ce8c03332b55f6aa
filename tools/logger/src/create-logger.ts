import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { format } from 'node:util';

import { type LogFn, Logger } from './logger';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
  /** Name written into every line (default: 'ocrflow') */
  name?: string;
  /** Minimum level that is written (default: 'info') */
  level?: LogLevel;
  /** Optional file that receives a copy of every line */
  filePath?: string;
  /** Sink for debug/info lines (default: process.stdout) */
  stdout?: (line: string) => void;
  /** Sink for warn/error lines (default: process.stderr) */
  stderr?: (line: string) => void;
  /** Time source for line prefixes */
  now?: () => Date;
}

const levelNames: readonly string[] = LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return levelNames.includes(value);
}

/**
 * Create a Logger that writes `<time> - <name> - <LEVEL> - <message>` lines.
 *
 * Arguments are joined with `util.format`, so calls such as
 * `logger.info('[Component] Using server:', url)` read naturally.
 * When the log file cannot be prepared the logger keeps writing to the console.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const {
    name = 'ocrflow',
    level = 'info',
    filePath,
    stdout = (line: string) => process.stdout.write(line),
    stderr = (line: string) => process.stderr.write(line),
    now = () => new Date(),
  } = options;

  const threshold = LOG_LEVELS.indexOf(level);
  let fileReady = false;

  const write = (lineLevel: LogLevel, args: unknown[]): void => {
    if (LOG_LEVELS.indexOf(lineLevel) < threshold) {
      return;
    }

    const line = `${now().toISOString()} - ${name} - ${lineLevel.toUpperCase()} - ${format(...args)}\n`;
    if (lineLevel === 'warn' || lineLevel === 'error') {
      stderr(line);
    } else {
      stdout(line);
    }

    if (fileReady && filePath) {
      appendFileSync(filePath, line);
    }
  };

  const methodFor =
    (lineLevel: LogLevel): LogFn =>
    (...args) =>
      write(lineLevel, args);

  const logger = new Logger({
    debug: methodFor('debug'),
    info: methodFor('info'),
    warn: methodFor('warn'),
    error: methodFor('error'),
  });

  if (filePath) {
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      fileReady = true;
    } catch (error) {
      logger.warn(`Failed to create log file at ${filePath}:`, error);
      logger.warn('Continuing with console logging only');
    }
  }

  return logger;
}
