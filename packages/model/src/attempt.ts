import type { ErrorRecord } from './error-record';
import type { OcrPayload } from './ocr-payload';

export type AttemptOutcome =
  | { ok: true; payload: OcrPayload }
  | { ok: false; error: ErrorRecord };

/**
 * One try at invoking the backend for a WorkItem. Immutable once finished.
 */
export interface Attempt {
  readonly itemId: string;
  /** 1-based */
  readonly attemptNumber: number;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly outcome: AttemptOutcome;
}
