/**
 * Backend flags applied to a document.
 *
 * Copied into every WorkItem of a batch unless a descriptor overrides them.
 */
export interface ProcessingOptions {
  /** Whether extracted images are returned base64-encoded in the payload */
  includeImages: boolean;

  /** Backend model identifier (backend default when omitted) */
  model?: string;

  /** 0-based page indexes to process (all pages when omitted) */
  pages?: number[];

  /** Maximum number of images to extract */
  imageLimit?: number;

  /** Minimum image edge size, in pixels, for extraction */
  imageMinSize?: number;
}

export const DEFAULT_PROCESSING_OPTIONS: Readonly<ProcessingOptions> =
  Object.freeze({ includeImages: false });
