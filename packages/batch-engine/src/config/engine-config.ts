import { z } from 'zod';

import { ConfigurationError } from '../errors/configuration-error';
import { OCR_ENGINE, RETRY_POLICY } from './constants';

export const retryConfigSchema = z
  .object({
    maxAttempts: z
      .number()
      .int()
      .min(1)
      .max(10)
      .default(RETRY_POLICY.DEFAULT_MAX_ATTEMPTS),
    baseDelayMs: z
      .number()
      .int()
      .nonnegative()
      .max(OCR_ENGINE.MAX_TIMER_DELAY_MS)
      .default(RETRY_POLICY.DEFAULT_BASE_DELAY_MS),
    maxDelayMs: z
      .number()
      .int()
      .nonnegative()
      .max(OCR_ENGINE.MAX_TIMER_DELAY_MS)
      .default(RETRY_POLICY.DEFAULT_MAX_DELAY_MS),
  })
  .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  });

export const resolverConfigSchema = z.object({
  /** Descend into subdirectories of a directory input */
  recursive: z.boolean().default(false),
  /** Return an empty list instead of failing when nothing is processable */
  allowEmpty: z.boolean().default(false),
  /** How files whose names differ only by case are treated */
  caseCollision: z.enum(['allow', 'reject']).default('allow'),
});

/**
 * Engine configuration.
 * Passed explicitly to the runner; nothing is read from process-wide state.
 */
export const engineConfigSchema = z.object({
  concurrencyLimit: z
    .number()
    .int()
    .min(1)
    .max(32)
    .default(OCR_ENGINE.DEFAULT_CONCURRENCY),
  callTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(OCR_ENGINE.MAX_TIMER_DELAY_MS)
    .default(OCR_ENGINE.DEFAULT_CALL_TIMEOUT_MS),
  /** Overall deadline for one batch; the batch is cancelled when it elapses */
  batchTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(OCR_ENGINE.MAX_TIMER_DELAY_MS)
    .optional(),
  retry: retryConfigSchema.default({}),
  resolver: resolverConfigSchema.default({}),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type ResolverConfig = z.infer<typeof resolverConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate engine settings and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigurationError(
      'Invalid engine configuration',
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  return result.data;
}
