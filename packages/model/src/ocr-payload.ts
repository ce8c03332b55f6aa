/**
 * Extracted content returned by the OCR backend for one document.
 *
 * Only the fields the engine relies on are typed; everything else the
 * backend sends is kept as-is.
 */
export interface OcrPage {
  index: number;
  markdown: string;
  images?: unknown[];
  dimensions?: unknown;
  [key: string]: unknown;
}

export interface OcrPayload {
  pages: OcrPage[];
  model?: string;
  usageInfo?: unknown;
  [key: string]: unknown;
}
