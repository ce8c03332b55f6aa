import type { LoggerMethods } from '@ocrflow/logger';

import { OcrBatchRunner, toBatchReport } from '@ocrflow/batch-engine';

import type { BackendFactory } from '../config/engine-settings';
import type { AppEnv } from '../config/env';
import type { ProcessArgs } from './parse-args';

import { toEngineConfig } from '../config/engine-settings';
import { writeReport } from '../output/write-report';

export interface ProcessCommandDeps {
  env: AppEnv;
  logger: LoggerMethods;
  createBackend: BackendFactory;
}

/** Every document succeeded */
export const EXIT_OK = 0;
/** Resolver, configuration or unexpected error */
export const EXIT_ERROR = 1;
/** The batch ran but some documents failed */
export const EXIT_PARTIAL_FAILURE = 2;

/**
 * `ocrflow process`: resolve inputs, run the batch and write the report.
 *
 * Resolver and configuration errors are thrown to the caller.
 */
export async function runProcessCommand(
  args: ProcessArgs,
  deps: ProcessCommandDeps,
): Promise<number> {
  const { env, logger } = deps;

  const runner = new OcrBatchRunner({
    backend: deps.createBackend(env, logger),
    logger,
    config: toEngineConfig(env, args),
  });

  const result = await runner.processInput(args.inputs, {
    processing: {
      includeImages: args.includeImages ?? env.OCR_INCLUDE_IMAGES,
      model: args.model,
    },
  });

  const outputPath = await writeReport(args.output, toBatchReport(result));

  logger.info(
    `[ocrflow] Processed ${result.items.length} document(s): ${result.succeededCount} succeeded, ${result.failedCount} failed`,
  );
  logger.info(`[ocrflow] Report written to ${outputPath}`);

  for (const item of result.items) {
    if (item.status === 'failed') {
      logger.warn(
        `[ocrflow] ${item.id} failed (${item.error.kind}): ${item.error.message}`,
      );
    }
  }

  return result.failedCount === 0 ? EXIT_OK : EXIT_PARTIAL_FAILURE;
}
