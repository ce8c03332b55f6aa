import type { EngineConfigInput, OcrBackend } from '@ocrflow/batch-engine';
import type { LoggerMethods } from '@ocrflow/logger';

import { ConfigurationError, MistralOcrBackend } from '@ocrflow/batch-engine';

import type { AppEnv } from './env';

/** Command line values that take precedence over environment variables */
export interface EngineOverrides {
  concurrency?: number;
  timeoutMs?: number;
  batchTimeoutMs?: number;
  maxAttempts?: number;
  recursive?: boolean;
  allowEmpty?: boolean;
}

export function toEngineConfig(
  env: AppEnv,
  overrides: EngineOverrides = {},
): EngineConfigInput {
  return {
    concurrencyLimit: overrides.concurrency ?? env.OCR_CONCURRENCY,
    callTimeoutMs: overrides.timeoutMs ?? env.OCR_CALL_TIMEOUT_MS,
    batchTimeoutMs: overrides.batchTimeoutMs ?? env.OCR_BATCH_TIMEOUT_MS,
    retry: {
      maxAttempts: overrides.maxAttempts ?? env.OCR_MAX_ATTEMPTS,
      baseDelayMs: env.OCR_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.OCR_RETRY_MAX_DELAY_MS,
    },
    resolver: {
      recursive: overrides.recursive,
      allowEmpty: overrides.allowEmpty,
    },
  };
}

export type BackendFactory = (
  env: AppEnv,
  logger: LoggerMethods,
) => OcrBackend;

export const createMistralBackend: BackendFactory = (env, logger) => {
  if (!env.MISTRAL_API_KEY) {
    throw new ConfigurationError(
      'MISTRAL_API_KEY is not set. Add it to the environment or a .env file.',
    );
  }

  return new MistralOcrBackend({
    apiKey: env.MISTRAL_API_KEY,
    defaultModel: env.OCR_MODEL,
    logger,
  });
};
