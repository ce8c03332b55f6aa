import type { LoggerMethods } from '@ocrflow/logger';
import type {
  Attempt,
  BatchResult,
  ItemResult,
  ProcessingOptions,
  WorkItem,
} from '@ocrflow/model';
import type { Clock } from '@ocrflow/shared';
import type { z } from 'zod';

import type { OcrBackend, OcrClient } from '../backend/ocr-backend';
import type { EngineConfig, EngineConfigInput } from '../config/engine-config';
import type { InputDescriptor } from '../resolver/document-resolver';

import { BackendClientAdapter } from '../backend/backend-client-adapter';
import {
  engineConfigSchema,
  parseEngineConfig,
} from '../config/engine-config';
import { ConfigurationError, InvalidInputError } from '../errors';
import { DocumentResolver } from '../resolver/document-resolver';
import { RetryPolicy } from '../retry/retry-policy';
import { BatchScheduler } from '../scheduler/batch-scheduler';

type OcrBatchRunnerOptions = {
  logger: LoggerMethods;
  config?: EngineConfigInput;
  clock?: Clock;
  onAttempt?: (attempt: Attempt) => void;
  onItemComplete?: (result: ItemResult, index: number) => void;
} & (
  | {
      /** Raw transport, wrapped in a BackendClientAdapter */
      backend: OcrBackend;
    }
  | {
      /** Ready-made client, used as-is */
      client: OcrClient;
    }
);

export interface SubmitBatchOptions {
  /** Overrides the configured concurrency limit */
  concurrencyLimit?: number;
  /** Overall batch deadline; overrides the configured batchTimeoutMs */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProcessInputOptions extends SubmitBatchOptions {
  /** Processing options for every resolved item */
  processing?: Partial<ProcessingOptions>;
}

/**
 * OcrBatchRunner
 *
 * Entry point of the engine: resolves inputs into WorkItems and runs them
 * through the scheduler.
 *
 * Resolver errors are thrown before a batch starts. Failures of single
 * documents never throw; they are reported in the BatchResult.
 */
export class OcrBatchRunner {
  readonly config: EngineConfig;
  private readonly logger: LoggerMethods;
  private readonly resolver: DocumentResolver;
  private readonly scheduler: BatchScheduler;

  /**
   * @throws ConfigurationError when `config` is invalid
   */
  constructor(options: OcrBatchRunnerOptions) {
    this.logger = options.logger;
    this.config = parseEngineConfig(options.config);

    const client =
      'client' in options
        ? options.client
        : new BackendClientAdapter({
            backend: options.backend,
            logger: options.logger,
            callTimeoutMs: this.config.callTimeoutMs,
          });

    this.resolver = new DocumentResolver({
      logger: options.logger,
      ...this.config.resolver,
    });
    this.scheduler = new BatchScheduler({
      client,
      logger: options.logger,
      retryPolicy: new RetryPolicy(this.config.retry),
      clock: options.clock,
      onAttempt: options.onAttempt,
      onItemComplete: options.onItemComplete,
    });
  }

  /**
   * Resolve one or more input descriptors and process the resulting batch.
   *
   * @throws InvalidInputError | UnsupportedFileTypeError before anything is sent
   */
  async processInput(
    input: InputDescriptor | InputDescriptor[],
    options: ProcessInputOptions = {},
  ): Promise<BatchResult> {
    const { processing, ...submitOptions } = options;
    const descriptors = (Array.isArray(input) ? input : [input]).map(
      (descriptor) =>
        typeof descriptor === 'string'
          ? { input: descriptor, options: processing }
          : {
              input: descriptor.input,
              options: { ...processing, ...descriptor.options },
            },
    );

    const items = await this.resolver.resolveAll(descriptors);
    return this.submitBatch(items, submitOptions);
  }

  /**
   * Run already resolved WorkItems as one batch.
   *
   * @throws ConfigurationError when `concurrencyLimit` or `timeoutMs` is out of range
   * @throws InvalidInputError when two WorkItems share an id
   */
  async submitBatch(
    workItems: readonly WorkItem[],
    options: SubmitBatchOptions = {},
  ): Promise<BatchResult> {
    const concurrencyLimit = checkOption(
      'concurrencyLimit',
      engineConfigSchema.shape.concurrencyLimit,
      options.concurrencyLimit ?? this.config.concurrencyLimit,
    );
    const timeoutMs = checkOption(
      'timeoutMs',
      engineConfigSchema.shape.batchTimeoutMs,
      options.timeoutMs ?? this.config.batchTimeoutMs,
    );
    assertUniqueIds(workItems);
    const signals: AbortSignal[] = [];

    if (options.signal) {
      signals.push(options.signal);
    }
    if (timeoutMs !== undefined) {
      this.logger.debug(`[OcrBatchRunner] Batch deadline: ${timeoutMs}ms`);
      signals.push(AbortSignal.timeout(timeoutMs));
    }

    return this.scheduler.run(workItems, {
      concurrencyLimit,
      signal: signals.length > 1 ? AbortSignal.any(signals) : signals[0],
    });
  }
}

function checkOption<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  value: unknown,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid batch options',
      result.error.issues.map((issue) => `${name}: ${issue.message}`),
    );
  }
  return result.data;
}

function assertUniqueIds(workItems: readonly WorkItem[]): void {
  const seen = new Set<string>();
  for (const item of workItems) {
    if (seen.has(item.id)) {
      throw new InvalidInputError(
        `Duplicate work item id: ${item.id}`,
        item.id,
      );
    }
    seen.add(item.id);
  }
}

export type { OcrBatchRunnerOptions };
