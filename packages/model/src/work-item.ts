import type { ProcessingOptions } from './processing-options';

/** A local document found on disk */
export interface FileRef {
  kind: 'file';
  /** Absolute path of the file */
  path: string;
  /** File name including extension */
  name: string;
  /** Lower-case extension without the dot (e.g. 'pdf') */
  extension: string;
  sizeBytes: number;
}

/** A remote document; validated only when the backend fetches it */
export interface UrlRef {
  kind: 'url';
  url: string;
  /** Lower-case extension of the URL path, when it has one */
  extension?: string;
}

export type DocumentSource = FileRef | UrlRef;

/**
 * One document submitted for OCR within a batch.
 *
 * The id is derived from input order and never reused inside a batch.
 * WorkItems are frozen once created and shared by reference.
 */
export interface WorkItem {
  readonly id: string;
  readonly source: Readonly<DocumentSource>;
  readonly options: Readonly<ProcessingOptions>;
}

/** Display label for a source: the file path or the URL */
export function describeSource(source: DocumentSource): string {
  return source.kind === 'file' ? source.path : source.url;
}
