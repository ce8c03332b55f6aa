export type { Attempt, AttemptOutcome } from './attempt';
export type { BatchResult } from './batch-result';
export type { ErrorKind, ErrorRecord } from './error-record';
export type { FailedItem, ItemResult, SucceededItem } from './item-result';
export type { OcrPage, OcrPayload } from './ocr-payload';
export {
  DEFAULT_PROCESSING_OPTIONS,
  type ProcessingOptions,
} from './processing-options';
export {
  describeSource,
  type DocumentSource,
  type FileRef,
  type UrlRef,
  type WorkItem,
} from './work-item';
