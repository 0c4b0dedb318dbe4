/**
 * Summary Dispatcher
 *
 * Collects rendered summaries into batches and delivers each batch with
 * bounded concurrency. Batches run one after another; within a batch at
 * most `maxConcurrent` deliveries are in flight.
 *
 * @module delivery/dispatcher
 */

import { DEFAULT_BATCH_SIZE, DEFAULT_MAX_CONCURRENT } from '../config/index.js';
import {
  silentLogger,
  type DeliveryResult,
  type DeliveryStats,
  type Logger,
  type SummaryItem,
} from '../pipeline/types.js';
import type { DeliveryClient } from './client.js';
import { ConcurrencyLimiter } from './concurrency.js';

// ============================================================================
// Types
// ============================================================================

export interface DispatcherOptions {
  /** Summaries per batch (default: 100) */
  batchSize?: number;
  /** Deliveries in flight within a batch (default: 10) */
  maxConcurrent?: number;
  logger?: Logger;
  /** Called after every batch with its results */
  onBatchComplete?: (results: DeliveryResult[], batchNumber: number) => void;
}

// ============================================================================
// Dispatcher
// ============================================================================

/**
 * @example
 * ```typescript
 * const dispatcher = new SummaryDispatcher(client, { batchSize: 100, maxConcurrent: 10 });
 * for (const item of items) {
 *   await dispatcher.submit(item);
 * }
 * await dispatcher.flush();
 * console.log(dispatcher.getStats());
 * ```
 */
export class SummaryDispatcher {
  private readonly batchSize: number;
  private readonly limiter: ConcurrencyLimiter;
  private readonly logger: Logger;
  private readonly onBatchComplete?: (results: DeliveryResult[], batchNumber: number) => void;
  private pending: SummaryItem[] = [];
  private readonly stats: DeliveryStats = {
    submitted: 0,
    delivered: 0,
    failed: 0,
    attempts: 0,
    batches: 0,
    failedKeys: [],
  };

  constructor(
    private readonly client: DeliveryClient,
    options: DispatcherOptions = {}
  ) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('batchSize must be a positive integer');
    }
    this.batchSize = batchSize;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
    this.logger = options.logger ?? silentLogger;
    this.onBatchComplete = options.onBatchComplete;
  }

  /**
   * Queues a summary; a full batch is delivered before this resolves.
   */
  async submit(item: SummaryItem): Promise<void> {
    this.pending.push(item);
    this.stats.submitted++;
    if (this.pending.length >= this.batchSize) {
      await this.dispatch();
    }
  }

  /**
   * Delivers whatever is queued, even a partial batch.
   */
  async flush(): Promise<void> {
    if (this.pending.length > 0) {
      await this.dispatch();
    }
  }

  /** Summaries queued but not yet dispatched */
  get pendingCount(): number {
    return this.pending.length;
  }

  getStats(): DeliveryStats {
    return { ...this.stats, failedKeys: [...this.stats.failedKeys] };
  }

  private async dispatch(): Promise<void> {
    const batch = this.pending;
    this.pending = [];
    const batchNumber = ++this.stats.batches;

    this.logger.debug(`Processing batch ${batchNumber} of ${batch.length} summaries...`);

    const results = await Promise.all(
      batch.map((item) => this.limiter.run(() => this.deliverOne(item)))
    );

    let succeeded = 0;
    for (const result of results) {
      this.stats.attempts += result.attempts;
      if (result.success) {
        succeeded++;
        this.stats.delivered++;
      } else {
        this.stats.failed++;
        this.stats.failedKeys.push(`${result.userId}/${result.date}`);
      }
    }

    this.logger.info(`Batch completed: ${succeeded}/${batch.length} successful`);
    this.onBatchComplete?.(results, batchNumber);
  }

  private async deliverOne(item: SummaryItem): Promise<DeliveryResult> {
    try {
      return await this.client.deliver(item);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Delivery of ${item.userId}/${item.date} threw: ${message}`);
      return { userId: item.userId, date: item.date, success: false, attempts: 0, error: message };
    }
  }
}
