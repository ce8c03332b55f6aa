import type { LoggerMethods } from '@ocrflow/logger';
import type { DocumentSource, FileRef } from '@ocrflow/model';

import { Mistral } from '@mistralai/mistralai';
import { readFile } from 'node:fs/promises';

import type { OcrBackend, OcrBackendRequest } from './ocr-backend';

import { MISTRAL_OCR, isImageExtension } from '../config/constants';

type MistralDocument =
  | { type: 'document_url'; documentUrl: string }
  | { type: 'image_url'; imageUrl: string };

interface MistralRequestOptions {
  fetchOptions?: { signal?: AbortSignal };
}

/**
 * The part of the Mistral SDK client this backend uses.
 */
export interface MistralOcrApi {
  ocr: {
    process(
      request: {
        model: string;
        document: MistralDocument;
        includeImageBase64?: boolean;
        pages?: number[];
        imageLimit?: number;
        imageMinSize?: number;
      },
      options?: MistralRequestOptions,
    ): Promise<unknown>;
  };
  files: {
    upload(
      request: {
        file: { fileName: string; content: Uint8Array };
        purpose: 'ocr';
      },
      options?: MistralRequestOptions,
    ): Promise<{ id: string }>;
    getSignedUrl(
      request: { fileId: string },
      options?: MistralRequestOptions,
    ): Promise<{ url: string }>;
  };
}

type MistralOcrBackendOptions = {
  logger: LoggerMethods;
  /** Model used when a request names none */
  defaultModel?: string;
} & (
  | {
      apiKey: string;
      /** Overrides the API base URL */
      serverURL?: string;
    }
  | {
      /** Pre-built client (tests, shared instances) */
      client: MistralOcrApi;
    }
);

/**
 * MistralOcrBackend
 *
 * OcrBackend backed by the Mistral OCR API.
 *
 * - URLs are passed straight to `ocr.process`, as an image chunk for image
 *   extensions and as a document chunk otherwise.
 * - Local files are uploaded with purpose `ocr`, exchanged for a signed URL
 *   and then processed.
 *
 * Errors from the SDK are thrown unchanged for the adapter to classify.
 */
export class MistralOcrBackend implements OcrBackend {
  readonly name = 'mistral';
  private readonly client: MistralOcrApi;
  private readonly logger: LoggerMethods;
  private readonly defaultModel: string;

  constructor(options: MistralOcrBackendOptions) {
    this.logger = options.logger;
    this.defaultModel = options.defaultModel ?? MISTRAL_OCR.DEFAULT_MODEL;
    this.client =
      'client' in options
        ? options.client
        : new Mistral({
            apiKey: options.apiKey,
            serverURL: options.serverURL,
          });
  }

  async process(
    request: OcrBackendRequest,
    signal: AbortSignal,
  ): Promise<unknown> {
    const requestOptions = { fetchOptions: { signal } };
    const document = await this.toDocument(request.source, requestOptions);

    return this.client.ocr.process(
      {
        model: request.model ?? this.defaultModel,
        document,
        includeImageBase64: request.includeImages,
        pages: request.pages,
        imageLimit: request.imageLimit,
        imageMinSize: request.imageMinSize,
      },
      requestOptions,
    );
  }

  private async toDocument(
    source: DocumentSource,
    requestOptions: MistralRequestOptions,
  ): Promise<MistralDocument> {
    if (source.kind === 'url') {
      this.logger.info(`[MistralOcrBackend] Processing URL: ${source.url}`);
      return toChunk(source.url, source.extension);
    }

    const signedUrl = await this.uploadFile(source, requestOptions);
    return toChunk(signedUrl, source.extension);
  }

  private async uploadFile(
    file: FileRef,
    requestOptions: MistralRequestOptions,
  ): Promise<string> {
    this.logger.info(`[MistralOcrBackend] Uploading file: ${file.path}`);

    const content = await readFile(file.path);
    const uploaded = await this.client.files.upload(
      {
        file: { fileName: file.name, content },
        purpose: MISTRAL_OCR.UPLOAD_PURPOSE,
      },
      requestOptions,
    );

    this.logger.debug(
      `[MistralOcrBackend] Uploaded ${file.name} as ${uploaded.id}`,
    );

    const signed = await this.client.files.getSignedUrl(
      { fileId: uploaded.id },
      requestOptions,
    );
    return signed.url;
  }
}

function toChunk(url: string, extension: string | undefined): MistralDocument {
  return extension !== undefined && isImageExtension(extension)
    ? { type: 'image_url', imageUrl: url }
    : { type: 'document_url', documentUrl: url };
}

export type { MistralOcrBackendOptions };
