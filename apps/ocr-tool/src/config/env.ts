import { ConfigurationError, MISTRAL_OCR } from '@ocrflow/batch-engine';
import { LOG_LEVELS } from '@ocrflow/logger';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const integer = z.coerce.number().int();

/**
 * Environment variables read by the CLI and the REST server.
 * Range checks on engine settings happen in the engine configuration.
 */
export const envSchema = z.object({
  MISTRAL_API_KEY: z.string().min(1).optional(),
  OCR_MODEL: z.string().min(1).default(MISTRAL_OCR.DEFAULT_MODEL),
  OCR_INCLUDE_IMAGES: booleanFlag.default('false'),
  OCR_CONCURRENCY: integer.optional(),
  OCR_CALL_TIMEOUT_MS: integer.optional(),
  OCR_BATCH_TIMEOUT_MS: integer.optional(),
  OCR_MAX_ATTEMPTS: integer.optional(),
  OCR_RETRY_BASE_DELAY_MS: integer.optional(),
  OCR_RETRY_MAX_DELAY_MS: integer.optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: integer.min(0).max(65535).default(8000),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables. Empty values count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): AppEnv {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  return result.data;
}
