import type { LoggerMethods } from '@ocrflow/logger';
import type { WorkItem } from '@ocrflow/model';

import { afterEach, describe, expect, test, vi } from 'vitest';

import type { OcrBackend, OcrBackendRequest } from './ocr-backend';

import { BackendHttpError } from '../errors';
import { BackendClientAdapter } from './backend-client-adapter';

const makeLogger = (): LoggerMethods => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const item: WorkItem = {
  id: 'item-001',
  source: { kind: 'url', url: 'https://example.com/a.pdf', extension: 'pdf' },
  options: { includeImages: true, model: 'ocr-model', pages: [0, 2] },
};

const payload = {
  pages: [{ index: 0, markdown: '# Title', images: [] }],
  model: 'ocr-model',
  usageInfo: { pagesProcessed: 1 },
  documentAnnotation: null,
};

const makeBackend = (
  process: (request: OcrBackendRequest, signal: AbortSignal) => Promise<unknown>,
): OcrBackend => ({ name: 'fake', process: vi.fn(process) });

describe('BackendClientAdapter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns the validated payload and keeps extra fields', async () => {
    const backend = makeBackend(async () => payload);
    const adapter = new BackendClientAdapter({ backend, logger: makeLogger() });

    const outcome = await adapter.invoke(item);

    expect(outcome).toEqual({ ok: true, payload });
  });

  test('passes the processing options to the backend', async () => {
    const backend = makeBackend(async () => payload);
    const adapter = new BackendClientAdapter({ backend, logger: makeLogger() });

    await adapter.invoke(item);

    expect(backend.process).toHaveBeenCalledWith(
      {
        source: item.source,
        includeImages: true,
        model: 'ocr-model',
        pages: [0, 2],
        imageLimit: undefined,
        imageMinSize: undefined,
      },
      expect.any(AbortSignal),
    );
  });

  test('reports a classified failure instead of throwing', async () => {
    const backend = makeBackend(async () => {
      throw new BackendHttpError('Internal Server Error', 500);
    });
    const logger = makeLogger();
    const adapter = new BackendClientAdapter({ backend, logger });

    const outcome = await adapter.invoke(item);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: 'BackendFault',
        message: 'Internal Server Error',
        retryable: true,
        backendStatus: 500,
      },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      '[BackendClientAdapter] item-001 failed (BackendFault): Internal Server Error',
    );
  });

  test('rejects a response without pages', async () => {
    const backend = makeBackend(async () => ({ pages: [] }));
    const adapter = new BackendClientAdapter({ backend, logger: makeLogger() });

    const outcome = await adapter.invoke(item);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: 'MalformedResponse',
        message: 'Malformed backend response: pages: Response contains no pages',
        retryable: false,
      },
    });
  });

  test('rejects an empty response', async () => {
    const backend = makeBackend(async () => null);
    const adapter = new BackendClientAdapter({ backend, logger: makeLogger() });

    const outcome = await adapter.invoke(item);

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: 'MalformedResponse',
        message: 'Backend returned an empty response',
        retryable: false,
      },
    });
  });

  test('times out without waiting for the backend and aborts its signal', async () => {
    vi.useFakeTimers();
    let received: AbortSignal | undefined;
    const backend = makeBackend(
      (_request, signal) =>
        new Promise(() => {
          received = signal;
        }),
    );
    const adapter = new BackendClientAdapter({
      backend,
      logger: makeLogger(),
      callTimeoutMs: 50,
    });

    const pending = adapter.invoke(item);
    await vi.advanceTimersByTimeAsync(50);
    const outcome = await pending;

    expect(outcome).toEqual({
      ok: false,
      error: {
        kind: 'Timeout',
        message: 'Backend call exceeded 50ms',
        retryable: true,
      },
    });
    expect(received?.aborted).toBe(true);
  });

  test('clears the timer when the backend answers first', async () => {
    vi.useFakeTimers();
    const backend = makeBackend(async () => payload);
    const adapter = new BackendClientAdapter({
      backend,
      logger: makeLogger(),
      callTimeoutMs: 1000,
    });

    await adapter.invoke(item);

    expect(vi.getTimerCount()).toBe(0);
  });
});
