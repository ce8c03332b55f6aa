import type { OcrBatchRunner } from '@ocrflow/batch-engine';
import type { LoggerMethods } from '@ocrflow/logger';
import type { BatchResult, ItemResult } from '@ocrflow/model';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { ZodError } from 'zod';

import { ResolverError, toBatchReport } from '@ocrflow/batch-engine';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createServer } from 'node:http';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { VERSION } from '../version';
import {
  sendError,
  sendJson,
  sendPreflight,
  statusForErrorKind,
} from './http-responses';
import { RequestBodyError, readJsonBody } from './read-json-body';
import { batchRequestSchema, processRequestSchema } from './request-schemas';

export interface OcrServerOptions {
  logger: LoggerMethods;
  /** Creates the runner for one request; requests share no batch state */
  createRunner: () => OcrBatchRunner;
  /** Used when a request does not set includeImages */
  includeImagesByDefault?: boolean;
  maxBodyBytes?: number;
}

/**
 * OcrServer
 *
 * JSON API over the batch engine, built on `node:http`.
 *
 * - `GET /health`
 * - `POST /ocr/process` processes one URL or one base64-encoded file
 * - `POST /ocr/batch` processes up to ten URLs
 *
 * Every response carries permissive CORS headers and `OPTIONS` preflights
 * are answered with 204.
 */
export class OcrServer {
  private server: Server | null = null;
  private readonly logger: LoggerMethods;
  private readonly createRunner: () => OcrBatchRunner;
  private readonly includeImagesByDefault: boolean;
  private readonly maxBodyBytes?: number;

  constructor(options: OcrServerOptions) {
    this.logger = options.logger;
    this.createRunner = options.createRunner;
    this.includeImagesByDefault = options.includeImagesByDefault ?? false;
    this.maxBodyBytes = options.maxBodyBytes;
  }

  /**
   * Start listening.
   * @returns Base URL of the server (e.g. `http://127.0.0.1:8000`)
   */
  async start(port: number, host: string): Promise<string> {
    const server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.logger.error('[OcrServer] Failed to send response:', error);
      });
    });
    this.server = server;

    return new Promise<string>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        const address = server.address();
        /* v8 ignore start -- address is always AddressInfo for TCP listen */
        if (typeof address !== 'object' || address === null) {
          reject(new Error('Failed to get server address'));
          return;
        }
        /* v8 ignore stop */
        const url = `http://${host}:${address.port}`;
        this.logger.info(`[OcrServer] Listening on ${url}`);
        resolve(url);
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });

    this.logger.info('[OcrServer] Stopped');
  }

  private async handle(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    try {
      if (method === 'OPTIONS') {
        sendPreflight(res);
      } else if (method === 'GET' && path === '/health') {
        sendJson(res, 200, { status: 'healthy', version: VERSION });
      } else if (method === 'POST' && path === '/ocr/process') {
        await this.handleProcess(req, res);
      } else if (method === 'POST' && path === '/ocr/batch') {
        await this.handleBatch(req, res);
      } else {
        sendError(res, 404, `Route not found: ${method} ${path}`, 'NOT_FOUND');
      }
    } catch (error) {
      if (error instanceof RequestBodyError) {
        sendError(res, error.statusCode, error.message, error.code);
      } else if (error instanceof ResolverError) {
        sendError(res, 400, error.message, error.kind);
      } else {
        this.logger.error(`[OcrServer] ${method} ${path} failed:`, error);
        sendError(res, 500, 'Internal server error', 'INTERNAL_ERROR');
      }
    }
  }

  private async handleProcess(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    const parsed = processRequestSchema.safeParse(
      await readJsonBody(req, this.maxBodyBytes),
    );
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const request = parsed.data;
    const processing = {
      includeImages: request.includeImages ?? this.includeImagesByDefault,
    };
    const runner = this.createRunner();

    if (request.processType === 'url') {
      this.logger.info(`[OcrServer] Processing URL: ${request.url}`);
      const result = await runner.processInput(request.url, { processing });
      sendItemResult(res, result.items[0], request.url);
      return;
    }

    this.logger.info(
      `[OcrServer] Processing uploaded file: ${request.fileName}`,
    );
    const directory = await mkdtemp(join(tmpdir(), 'ocrflow-upload-'));
    let result: BatchResult;
    try {
      const filePath = join(directory, safeFileName(request.fileName));
      await writeFile(filePath, Buffer.from(request.contentBase64, 'base64'));
      result = await runner.processInput(filePath, { processing });
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
    // Respond only once the upload is gone
    sendItemResult(res, result.items[0], request.fileName);
  }

  private async handleBatch(
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    const parsed = batchRequestSchema.safeParse(
      await readJsonBody(req, this.maxBodyBytes),
    );
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const { urls, includeImages } = parsed.data;
    this.logger.info(`[OcrServer] Processing batch of ${urls.length} URL(s)`);

    const result = await this.createRunner().processInput(urls, {
      processing: {
        includeImages: includeImages ?? this.includeImagesByDefault,
      },
    });
    const report = toBatchReport(result);

    sendJson(res, 200, {
      ...report,
      failedUrls: report.items
        .filter((item) => item.status === 'failed')
        .map((item) => item.source),
    });
  }
}

function sendItemResult(
  res: ServerResponse,
  item: ItemResult,
  label: string,
): void {
  if (item.status === 'succeeded') {
    sendJson(res, 200, { file: label, response: item.payload });
    return;
  }

  sendError(
    res,
    statusForErrorKind(item.error.kind),
    item.error.message,
    item.error.kind,
  );
}

function sendValidationError(res: ServerResponse, error: ZodError): void {
  sendError(
    res,
    400,
    'Validation failed',
    'VALIDATION_ERROR',
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Keep only the last path segment and replace characters outside [A-Za-z0-9_.-].
 */
export function safeFileName(name: string): string {
  const base = basename(name.replace(/\\/g, '/')).replace(/[^\w.-]/g, '_');
  return base === '' || /^\.+$/.test(base) ? 'upload' : base;
}
