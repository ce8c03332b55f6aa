import type { BatchReport } from '@ocrflow/batch-engine';

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

/**
 * Write a batch report as pretty-printed JSON, creating parent directories.
 *
 * @returns absolute path of the written file
 */
export async function writeReport(
  outputPath: string,
  report: BatchReport,
): Promise<string> {
  const fullPath = resolve(outputPath);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  return fullPath;
}
