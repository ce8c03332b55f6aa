import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { writeReport } from './write-report';

describe('writeReport', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'ocrflow-report-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('creates missing directories and writes formatted json', async () => {
    const report = {
      summary: { total: 0, succeeded: 0, failed: 0 },
      items: [],
    };

    const written = await writeReport(join(root, 'nested', 'out.json'), report);

    expect(written).toBe(join(root, 'nested', 'out.json'));
    expect(await readFile(written, 'utf-8')).toBe(
      '{\n  "summary": {\n    "total": 0,\n    "succeeded": 0,\n    "failed": 0\n  },\n  "items": []\n}\n',
    );
  });
});
