import type { BatchResult, ErrorRecord, OcrPayload } from '@ocrflow/model';

import { describeSource } from '@ocrflow/model';

export interface BatchReportItem {
  id: string;
  /** File path or URL of the document */
  source: string;
  status: 'succeeded' | 'failed';
  attemptsUsed: number;
  response?: OcrPayload;
  error?: ErrorRecord;
}

/**
 * Serializable form of a BatchResult, written by the CLI and returned by the REST API.
 */
export interface BatchReport {
  summary: {
    total: number;
    succeeded: number;
    failed: number;
  };
  items: BatchReportItem[];
}

export function toBatchReport(result: BatchResult): BatchReport {
  return {
    summary: {
      total: result.items.length,
      succeeded: result.succeededCount,
      failed: result.failedCount,
    },
    items: result.items.map((item) => {
      const base = {
        id: item.id,
        source: describeSource(item.source),
        status: item.status,
        attemptsUsed: item.attemptsUsed,
      };
      return item.status === 'succeeded'
        ? { ...base, response: item.payload }
        : { ...base, error: item.error };
    }),
  };
}
