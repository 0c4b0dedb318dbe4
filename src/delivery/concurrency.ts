/**
 * Concurrency control for summary deliveries.
 *
 * @module delivery/concurrency
 */

/**
 * Statistics about the current state of the ConcurrencyLimiter.
 */
export interface ConcurrencyStats {
  /** Number of currently running operations */
  running: number;
  /** Number of operations waiting in queue */
  queued: number;
  /** Maximum concurrent operations allowed */
  limit: number;
  /** Highest running count observed since construction */
  peak: number;
}

/**
 * ConcurrencyLimiter controls the maximum number of concurrent operations.
 *
 * Uses a semaphore pattern with promise-based queue for waiting callers.
 * The dispatcher pushes a whole batch through one limiter, so exactly
 * `limit` deliveries stay in flight while work remains; a slot freed by a
 * fast delivery is taken at once by the next queued one.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(10);
 *
 * const results = await Promise.all(
 *   batch.map((item) => limiter.run(() => client.deliver(item)))
 * );
 * ```
 */
export class ConcurrencyLimiter {
  /** Maximum number of concurrent operations */
  private readonly limit: number;

  /** Current number of running operations */
  private running: number = 0;

  /** Highest value `running` has reached */
  private peak: number = 0;

  /** FIFO queue of pending acquire() calls waiting for a slot */
  private queue: Array<() => void> = [];

  /**
   * Creates a new ConcurrencyLimiter.
   *
   * @param limit - Maximum number of concurrent operations (default: 10)
   * @throws Error if limit is less than 1 or not an integer
   */
  constructor(limit: number = 10) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
    if (!Number.isInteger(limit)) {
      throw new Error('Concurrency limit must be an integer');
    }
    this.limit = limit;
  }

  /**
   * Acquires a slot for execution.
   *
   * If a slot is available, returns immediately. Otherwise, queues the request
   * and waits until a slot becomes available (FIFO ordering).
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.occupy();
      return;
    }

    // All slots in use - queue and wait for release
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Releases a previously acquired slot.
   *
   * If there are pending requests in the queue, the next one is immediately
   * granted the slot (FIFO order). Always call this in a finally block.
   *
   * @throws Error when called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    this.running--;

    // Hand the slot to the next waiter in FIFO order
    const next = this.queue.shift();
    if (next) {
      this.occupy();
      next();
    }
  }

  /**
   * Executes a function with automatic acquire/release handling.
   *
   * @param fn - Async function to execute within the concurrency limit
   * @returns Promise resolving to the function's return value
   * @throws Rethrows any error from fn after releasing the slot
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
      peak: this.peak,
    };
  }

  private occupy(): void {
    this.running++;
    if (this.running > this.peak) {
      this.peak = this.running;
    }
  }
}
