import type { LoggerMethods } from '@ocrflow/logger';
import type { AttemptOutcome, OcrPayload, WorkItem } from '@ocrflow/model';

import { TimeoutError } from 'es-toolkit';

import type { OcrBackend, OcrClient } from './ocr-backend';

import { OCR_ENGINE } from '../config/constants';
import { MalformedResponseError } from '../errors';
import { classifyBackendError } from './error-classifier';
import { toBackendRequest } from './ocr-backend';
import { ocrPayloadSchema } from './ocr-payload-schema';

export interface BackendClientAdapterOptions {
  backend: OcrBackend;
  logger: LoggerMethods;
  /** Per-call timeout in milliseconds */
  callTimeoutMs?: number;
}

/**
 * BackendClientAdapter
 *
 * Invokes an OcrBackend for one WorkItem and reports a uniform outcome.
 * Never throws: every failure becomes an ErrorRecord.
 *
 * When the call timeout elapses the adapter answers `Timeout` right away
 * and aborts the backend's signal instead of waiting for it.
 */
export class BackendClientAdapter implements OcrClient {
  private readonly backend: OcrBackend;
  private readonly logger: LoggerMethods;
  private readonly callTimeoutMs: number;

  constructor(options: BackendClientAdapterOptions) {
    this.backend = options.backend;
    this.logger = options.logger;
    this.callTimeoutMs =
      options.callTimeoutMs ?? OCR_ENGINE.DEFAULT_CALL_TIMEOUT_MS;
  }

  async invoke(item: WorkItem): Promise<AttemptOutcome> {
    try {
      const raw = await this.callWithTimeout(item);
      return { ok: true, payload: parsePayload(raw) };
    } catch (error) {
      const record = classifyBackendError(error);
      this.logger.warn(
        `[BackendClientAdapter] ${item.id} failed (${record.kind}): ${record.message}`,
      );
      return { ok: false, error: record };
    }
  }

  private async callWithTimeout(item: WorkItem): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(
          `Backend call exceeded ${this.callTimeoutMs}ms`,
        );
        controller.abort(error);
        reject(error);
      }, this.callTimeoutMs);
    });

    this.logger.debug(
      `[BackendClientAdapter] Calling ${this.backend.name} for ${item.id}`,
    );

    try {
      return await Promise.race([
        this.backend.process(toBackendRequest(item), controller.signal),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function parsePayload(raw: unknown): OcrPayload {
  if (raw === null || raw === undefined) {
    throw new MalformedResponseError('Backend returned an empty response');
  }

  const result = ocrPayloadSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new MalformedResponseError(
      `Malformed backend response: ${issues.join('; ')}`,
      issues,
    );
  }

  return result.data;
}
