import type { LoggerMethods } from '@ocrflow/logger';

import { OcrBatchRunner } from '@ocrflow/batch-engine';

import type { BackendFactory } from '../config/engine-settings';
import type { AppEnv } from '../config/env';
import type { ServeArgs } from './parse-args';

import { toEngineConfig } from '../config/engine-settings';
import { OcrServer } from '../server/ocr-server';

export interface ServeCommandDeps {
  env: AppEnv;
  logger: LoggerMethods;
  createBackend: BackendFactory;
  /** Resolves when the server should shut down (default: SIGINT or SIGTERM) */
  waitForShutdown?: () => Promise<void>;
}

/**
 * `ocrflow serve`: run the REST API until shutdown is requested.
 */
export async function runServeCommand(
  args: ServeArgs,
  deps: ServeCommandDeps,
): Promise<number> {
  const { env, logger } = deps;
  const backend = deps.createBackend(env, logger);
  const config = toEngineConfig(env);

  const server = new OcrServer({
    logger,
    createRunner: () => new OcrBatchRunner({ backend, logger, config }),
    includeImagesByDefault: env.OCR_INCLUDE_IMAGES,
  });

  await server.start(args.port ?? env.PORT, args.host ?? env.HOST);
  await (deps.waitForShutdown ?? waitForSignal)();
  logger.info('[ocrflow] Shutting down');
  await server.stop();

  return 0;
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}
