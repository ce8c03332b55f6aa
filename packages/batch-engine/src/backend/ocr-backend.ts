import type { AttemptOutcome, DocumentSource, WorkItem } from '@ocrflow/model';

/**
 * What a backend needs to process one document.
 */
export interface OcrBackendRequest {
  source: DocumentSource;
  includeImages: boolean;
  model?: string;
  pages?: number[];
  imageLimit?: number;
  imageMinSize?: number;
}

/**
 * Raw OCR transport. May throw; the adapter turns failures into ErrorRecords.
 *
 * Implementations must stop work when `signal` aborts.
 */
export interface OcrBackend {
  readonly name: string;
  process(request: OcrBackendRequest, signal: AbortSignal): Promise<unknown>;
}

/**
 * Uniform call surface used by the scheduler. Never throws.
 */
export interface OcrClient {
  invoke(item: WorkItem): Promise<AttemptOutcome>;
}

export function toBackendRequest(item: WorkItem): OcrBackendRequest {
  const { includeImages, model, pages, imageLimit, imageMinSize } =
    item.options;

  return {
    source: item.source,
    includeImages,
    model,
    pages: pages ? [...pages] : undefined,
    imageLimit,
    imageMinSize,
  };
}
