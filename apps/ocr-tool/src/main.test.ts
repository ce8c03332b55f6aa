import type { OcrBackend, OcrBackendRequest } from '@ocrflow/batch-engine';
import type { LoggerMethods } from '@ocrflow/logger';

import { BackendHttpError } from '@ocrflow/batch-engine';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { USAGE } from './commands/parse-args';
import { main } from './main';

const makeLogger = (): LoggerMethods => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const makeBackend = (): OcrBackend => ({
  name: 'fake',
  process: vi.fn(async (request: OcrBackendRequest) => {
    if (request.source.kind === 'file' && request.source.name === 'bad.pdf') {
      throw new BackendHttpError('Unprocessable document', 422);
    }
    return { pages: [{ index: 0, markdown: 'page text' }] };
  }),
});

describe('main', () => {
  let root: string;
  let logger: LoggerMethods;
  let stdout: (text: string) => void;
  let stderr: (text: string) => void;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'ocrflow-main-'));
    logger = makeLogger();
    stdout = vi.fn();
    stderr = vi.fn();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const run = (argv: string[], env: NodeJS.ProcessEnv = {}) =>
    main(argv, {
      env,
      stdout,
      stderr,
      createLogger: () => logger,
      createBackend: () => makeBackend(),
      waitForShutdown: async () => {},
    });

  test('prints usage and fails without a command', async () => {
    expect(await run([])).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`No command given\n\n${USAGE}`);
  });

  test('prints usage for help', async () => {
    expect(await run(['help'])).toBe(0);
    expect(stdout).toHaveBeenCalledWith(USAGE);
  });

  test('fails on invalid environment variables', async () => {
    const code = await run(['process', '-i', root, '-o', 'r.json'], {
      OCR_CONCURRENCY: 'many',
    });

    expect(code).toBe(1);
    expect(stderr).toHaveBeenCalledWith(
      'Invalid environment configuration:\n  - OCR_CONCURRENCY: Expected number, received nan\n',
    );
  });

  test('writes a report and exits 0 when every document succeeds', async () => {
    await writeFile(join(root, 'b.pdf'), 'b');
    await writeFile(join(root, 'a.png'), 'a');
    const output = join(root, 'out', 'report.json');

    const code = await run(['process', '-i', root, '-o', output]);

    expect(code).toBe(0);
    const report: unknown = JSON.parse(await readFile(output, 'utf-8'));
    expect(report).toEqual({
      summary: { total: 2, succeeded: 2, failed: 0 },
      items: [
        {
          id: 'item-001',
          source: join(root, 'a.png'),
          status: 'succeeded',
          attemptsUsed: 1,
          response: { pages: [{ index: 0, markdown: 'page text' }] },
        },
        {
          id: 'item-002',
          source: join(root, 'b.pdf'),
          status: 'succeeded',
          attemptsUsed: 1,
          response: { pages: [{ index: 0, markdown: 'page text' }] },
        },
      ],
    });
  });

  test('exits 2 when some documents fail', async () => {
    await writeFile(join(root, 'bad.pdf'), 'x');
    await writeFile(join(root, 'good.pdf'), 'y');
    const output = join(root, 'report.json');

    const code = await run(['process', '-i', root, '-o', output]);

    expect(code).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      '[ocrflow] item-001 failed (InvalidRequest): Unprocessable document',
    );
  });

  test('exits 1 when the input cannot be resolved', async () => {
    const missing = join(root, 'missing');

    const code = await run(['process', '-i', missing, '-o', 'r.json']);

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      `[ocrflow] Invalid input path: ${missing}. Must be a file, directory, or URL.`,
    );
  });

  test('exits 1 without an api key for the default backend', async () => {
    const code = await main(['process', '-i', root, '-o', 'r.json'], {
      env: {},
      stderr,
      createLogger: () => logger,
    });

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      '[ocrflow] MISTRAL_API_KEY is not set. Add it to the environment or a .env file.',
    );
  });

  test('serves until shutdown is requested', async () => {
    const code = await run([
      'serve',
      '--host',
      '127.0.0.1',
      '--port',
      '0',
    ]);

    expect(code).toBe(0);
    expect(logger.info).toHaveBeenCalledWith('[ocrflow] Shutting down');
    expect(logger.info).toHaveBeenCalledWith('[OcrServer] Stopped');
  });
});
