import type { ErrorRecord } from './error-record';
import type { OcrPayload } from './ocr-payload';
import type { DocumentSource } from './work-item';

interface ItemResultBase {
  /** Id of the WorkItem this result belongs to */
  id: string;
  source: DocumentSource;
  attemptsUsed: number;
}

export interface SucceededItem extends ItemResultBase {
  status: 'succeeded';
  payload: OcrPayload;
}

export interface FailedItem extends ItemResultBase {
  status: 'failed';
  error: ErrorRecord;
}

/**
 * Terminal state of a WorkItem. Exactly one exists per WorkItem once a batch completes.
 */
export type ItemResult = SucceededItem | FailedItem;
