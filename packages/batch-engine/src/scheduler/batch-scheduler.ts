import type { LoggerMethods } from '@ocrflow/logger';
import type {
  Attempt,
  AttemptOutcome,
  BatchResult,
  ErrorRecord,
  ItemResult,
  WorkItem,
} from '@ocrflow/model';
import type { Clock } from '@ocrflow/shared';

import { ConcurrencyGate, systemClock } from '@ocrflow/shared';

import type { OcrClient } from '../backend/ocr-backend';

import { ResultAggregator } from '../aggregator/result-aggregator';
import { classifyBackendError } from '../backend/error-classifier';
import { OCR_ENGINE } from '../config/constants';
import { RetryPolicy } from '../retry/retry-policy';

/**
 * Lifecycle of a WorkItem within one run.
 *
 * pending → in-flight → succeeded | retry-scheduled → in-flight | failed
 */
export type ItemState =
  | 'pending'
  | 'in-flight'
  | 'retry-scheduled'
  | 'succeeded'
  | 'failed';

export interface BatchSchedulerOptions {
  client: OcrClient;
  logger: LoggerMethods;
  retryPolicy?: RetryPolicy;
  clock?: Clock;
  /** Called after every finished attempt, in completion order */
  onAttempt?: (attempt: Attempt) => void;
  /** Called once per item when it reaches a terminal result */
  onItemComplete?: (result: ItemResult, index: number) => void;
}

export interface RunOptions {
  /** Maximum in-flight backend calls */
  concurrencyLimit?: number;
  /** Cancels the run: no new attempts start and unfinished items fail as Cancelled */
  signal?: AbortSignal;
}

export const CANCELLED_MESSAGE = 'Batch cancelled before the item completed';

/**
 * BatchScheduler
 *
 * Runs a list of WorkItems against an OcrClient with bounded concurrency and
 * retries, and returns one terminal result per item in input order.
 *
 * - A failing item never stops the others.
 * - An item waiting out a retry delay holds no concurrency slot.
 * - On cancellation `run` resolves right away. Calls already issued finish
 *   on their own and their results are discarded.
 *
 * Each call to `run` has its own state, so one scheduler can serve
 * concurrent batches.
 */
export class BatchScheduler {
  private readonly dependencies: RunDependencies;

  constructor(options: BatchSchedulerOptions) {
    this.dependencies = {
      client: options.client,
      logger: options.logger,
      retryPolicy: options.retryPolicy ?? new RetryPolicy(),
      clock: options.clock ?? systemClock,
      onAttempt: options.onAttempt,
      onItemComplete: options.onItemComplete,
    };
  }

  async run(
    workItems: readonly WorkItem[],
    options: RunOptions = {},
  ): Promise<BatchResult> {
    const { logger } = this.dependencies;
    const concurrencyLimit =
      options.concurrencyLimit ?? OCR_ENGINE.DEFAULT_CONCURRENCY;

    logger.info(
      `[BatchScheduler] Starting batch of ${workItems.length} item(s) with concurrency ${concurrencyLimit}`,
    );

    const run = new SchedulerRun(
      this.dependencies,
      workItems,
      new ConcurrencyGate(concurrencyLimit),
      options.signal,
    );
    const result = await run.execute();

    logger.info(
      `[BatchScheduler] Batch finished: ${result.succeededCount} succeeded, ${result.failedCount} failed`,
    );

    return result;
  }
}

type RunDependencies = Required<
  Pick<BatchSchedulerOptions, 'client' | 'logger' | 'retryPolicy' | 'clock'>
> &
  Pick<BatchSchedulerOptions, 'onAttempt' | 'onItemComplete'>;

/**
 * Mutable state of a single `BatchScheduler.run` call.
 */
class SchedulerRun {
  private readonly aggregator: ResultAggregator;
  private readonly states = new Map<string, ItemState>();
  private readonly attemptsUsed = new Map<string, number>();

  constructor(
    private readonly dependencies: RunDependencies,
    private readonly workItems: readonly WorkItem[],
    private readonly gate: ConcurrencyGate,
    private readonly signal?: AbortSignal,
  ) {
    this.aggregator = new ResultAggregator(workItems);
    for (const item of workItems) {
      this.states.set(item.id, 'pending');
      this.attemptsUsed.set(item.id, 0);
    }
  }

  async execute(): Promise<BatchResult> {
    const { signal } = this;
    let onAbort: (() => void) | undefined;

    const cancelled = new Promise<void>((resolve) => {
      if (!signal) {
        return;
      }
      if (signal.aborted) {
        resolve();
        return;
      }
      onAbort = () => resolve();
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      await Promise.race([
        Promise.all(
          this.workItems.map((item, index) => this.runItem(item, index)),
        ),
        cancelled,
      ]);
    } finally {
      if (onAbort) {
        signal?.removeEventListener('abort', onAbort);
      }
    }

    if (signal?.aborted) {
      this.cancelRemaining();
    }

    return this.aggregator.finalize();
  }

  private get aborted(): boolean {
    return this.signal?.aborted ?? false;
  }

  private isTerminal(itemId: string): boolean {
    const state = this.states.get(itemId);
    return state === 'succeeded' || state === 'failed';
  }

  private async runItem(item: WorkItem, index: number): Promise<void> {
    const { logger, retryPolicy, clock, onAttempt } = this.dependencies;

    try {
      for (;;) {
        if (!(await this.gate.acquire(this.signal))) {
          return;
        }

        this.states.set(item.id, 'in-flight');
        const attemptNumber = (this.attemptsUsed.get(item.id) ?? 0) + 1;
        this.attemptsUsed.set(item.id, attemptNumber);
        const startedAt = clock.now();

        let outcome: AttemptOutcome;
        try {
          outcome = await this.invoke(item);
        } finally {
          this.gate.release();
        }

        if (this.aborted) {
          return;
        }

        const attempt: Attempt = Object.freeze({
          itemId: item.id,
          attemptNumber,
          startedAt,
          finishedAt: clock.now(),
          outcome,
        });
        this.notify(() => onAttempt?.(attempt));

        if (outcome.ok) {
          this.settle(index, {
            id: item.id,
            source: item.source,
            attemptsUsed: attemptNumber,
            status: 'succeeded',
            payload: outcome.payload,
          });
          return;
        }

        const decision = retryPolicy.decide(outcome.error, attemptNumber);
        if (decision.action === 'give-up') {
          this.fail(index, outcome.error);
          return;
        }

        this.states.set(item.id, 'retry-scheduled');
        logger.debug(
          `[BatchScheduler] ${item.id} attempt ${attemptNumber} failed (${outcome.error.kind}), retrying in ${decision.delayMs}ms`,
        );

        try {
          await clock.sleep(decision.delayMs, this.signal);
        } catch (error) {
          if (this.aborted) {
            return;
          }
          throw error;
        }

        if (this.aborted) {
          return;
        }
      }
    } catch (error) {
      if (this.aborted || this.isTerminal(item.id)) {
        logger.error(
          `[BatchScheduler] Error after ${item.id} was already finished:`,
          error,
        );
        return;
      }

      logger.error(`[BatchScheduler] Unexpected error for ${item.id}:`, error);
      this.fail(index, {
        kind: 'BackendFault',
        message: `Internal error: ${error instanceof Error ? error.message : String(error)}`,
        retryable: false,
      });
    }
  }

  private async invoke(item: WorkItem): Promise<AttemptOutcome> {
    try {
      return await this.dependencies.client.invoke(item);
    } catch (error) {
      return { ok: false, error: classifyBackendError(error) };
    }
  }

  private fail(index: number, error: ErrorRecord): void {
    const item = this.workItems[index];
    this.settle(index, {
      id: item.id,
      source: item.source,
      attemptsUsed: this.attemptsUsed.get(item.id) ?? 0,
      status: 'failed',
      error,
    });
  }

  private settle(index: number, result: ItemResult): void {
    const { logger, onItemComplete } = this.dependencies;

    this.states.set(result.id, result.status);
    this.aggregator.record(result);

    if (result.status === 'succeeded') {
      logger.info(
        `[BatchScheduler] ${result.id} succeeded after ${result.attemptsUsed} attempt(s)`,
      );
    } else {
      logger.warn(
        `[BatchScheduler] ${result.id} failed after ${result.attemptsUsed} attempt(s): ${result.error.kind}`,
      );
    }

    this.notify(() => onItemComplete?.(result, index));
  }

  private cancelRemaining(): void {
    this.workItems.forEach((item, index) => {
      if (!this.isTerminal(item.id)) {
        this.fail(index, {
          kind: 'Cancelled',
          message: CANCELLED_MESSAGE,
          retryable: false,
        });
      }
    });
  }

  private notify(callback: () => void): void {
    const { logger } = this.dependencies;
    try {
      callback();
    } catch (error) {
      logger.error('[BatchScheduler] Observer threw:', error);
    }
  }
}
