import { describe, expect, test } from 'vitest';

import { toBatchReport } from './batch-report';

describe('toBatchReport', () => {
  test('renders summary and items with their sources', () => {
    const payload = { pages: [{ index: 0, markdown: '# Hello' }] };

    const report = toBatchReport({
      items: [
        {
          id: 'item-001',
          source: {
            kind: 'file',
            path: '/data/a.png',
            name: 'a.png',
            extension: 'png',
            sizeBytes: 10,
          },
          attemptsUsed: 1,
          status: 'succeeded',
          payload,
        },
        {
          id: 'item-002',
          source: { kind: 'url', url: 'https://example.com/b.pdf' },
          attemptsUsed: 3,
          status: 'failed',
          error: { kind: 'Timeout', message: 'late', retryable: true },
        },
      ],
      succeededCount: 1,
      failedCount: 1,
    });

    expect(report).toEqual({
      summary: { total: 2, succeeded: 1, failed: 1 },
      items: [
        {
          id: 'item-001',
          source: '/data/a.png',
          status: 'succeeded',
          attemptsUsed: 1,
          response: payload,
        },
        {
          id: 'item-002',
          source: 'https://example.com/b.pdf',
          status: 'failed',
          attemptsUsed: 3,
          error: { kind: 'Timeout', message: 'late', retryable: true },
        },
      ],
    });
  });
});
