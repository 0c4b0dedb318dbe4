/**
 * Vector Ingest Client
 *
 * POSTs rendered daily summaries to the vector-indexing endpoint.
 * Handles timeouts, stalled transfers, response validation and retries.
 *
 * @module delivery/client
 */

import { IngestPayloadSchema, IngestResponseSchema, SUMMARY_TYPE } from '../schemas/index.js';
import type { IngestPayload } from '../schemas/index.js';
import { silentLogger, type DeliveryResult, type Logger, type SummaryItem } from '../pipeline/types.js';
import { LowSpeedMonitor } from './low-speed.js';

// ============================================================================
// Constants
// ============================================================================

/** Attempts per summary before it is reported as failed */
export const MAX_ATTEMPTS = 3;

/** Base retry delay; attempt k waits k times this */
export const RETRY_DELAY_MS = 500;

/** Total time allowed for one attempt */
export const REQUEST_TIMEOUT_MS = 60_000;

/** Transfers slower than this (bytes/s) for a whole window are aborted */
export const LOW_SPEED_LIMIT = 100;

/** Low-speed window */
export const LOW_SPEED_TIME_MS = 30_000;

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can take a summary and report whether it was accepted.
 */
export interface DeliveryClient {
  deliver(item: SummaryItem): Promise<DeliveryResult>;
}

export interface VectorIngestClientOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  lowSpeedLimit?: number;
  lowSpeedTimeMs?: number;
  logger?: Logger;
  /** Replaces the retry delay; tests pass a recorder */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Failed delivery attempt. `statusCode` is 0 when no HTTP response arrived.
 */
export class IngestApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'IngestApiError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Linear backoff: 500 ms after the first failure, 1000 ms after the second.
 */
export function retryDelay(attempt: number, baseMs: number = RETRY_DELAY_MS): number {
  return baseMs * attempt;
}

/**
 * Builds the request envelope for a summary.
 */
export function buildPayload(item: SummaryItem): IngestPayload {
  return IngestPayloadSchema.parse({
    text: item.text,
    meta: {
      user_id: item.userId,
      date: item.date,
      type: SUMMARY_TYPE,
    },
  });
}

/**
 * Reads a response body chunk by chunk so the low-speed monitor sees progress.
 */
async function readBody(response: Response, monitor: LowSpeedMonitor): Promise<string> {
  if (!response.body) {
    return response.text();
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    if (value instanceof Uint8Array) {
      monitor.record(value.byteLength);
      text += decoder.decode(value, { stream: true });
    }
  }

  return text + decoder.decode();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Client
// ============================================================================

/**
 * HTTP delivery to the ingest endpoint.
 *
 * An attempt succeeds only on HTTP 200 or 201 with a JSON body whose
 * `status` is "ok". Anything else is retried up to `maxAttempts` times.
 * `deliver` never throws; failures come back as results.
 *
 * @example
 * ```typescript
 * const client = new VectorIngestClient('http://localhost:5000/ingest');
 * const result = await client.deliver({ userId: 'u1', date: '2024-03-01', text: '...' });
 * ```
 */
export class VectorIngestClient implements DeliveryClient {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly lowSpeedLimit: number;
  private readonly lowSpeedTimeMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly apiUrl: string,
    options: VectorIngestClientOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.lowSpeedLimit = options.lowSpeedLimit ?? LOW_SPEED_LIMIT;
    this.lowSpeedTimeMs = options.lowSpeedTimeMs ?? LOW_SPEED_TIME_MS;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleep;
  }

  async deliver(item: SummaryItem): Promise<DeliveryResult> {
    let payload: IngestPayload;
    try {
      payload = buildPayload(item);
    } catch (error) {
      const message = `Invalid summary for ${item.userId}/${item.date}: ${errorMessage(error)}`;
      this.logger.error(message);
      return { userId: item.userId, date: item.date, success: false, attempts: 0, error: message };
    }

    const body = JSON.stringify(payload);
    let lastError = '';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.post(body);
        return { userId: item.userId, date: item.date, success: true, attempts: attempt };
      } catch (error) {
        lastError = errorMessage(error);
        const status = error instanceof IngestApiError ? error.statusCode : 0;

        if (attempt < this.maxAttempts) {
          const reason = status > 0 ? `HTTP ${status}` : lastError;
          this.logger.warn(`Retry ${attempt}/${this.maxAttempts} for ${item.userId} (${reason})`);
          await this.sleep(retryDelay(attempt, this.retryDelayMs));
        }
      }
    }

    this.logger.error(
      `Failed after ${this.maxAttempts} attempts for ${item.userId} on ${item.date}: ${lastError}`
    );
    return {
      userId: item.userId,
      date: item.date,
      success: false,
      attempts: this.maxAttempts,
      error: lastError,
    };
  }

  /**
   * One attempt. Resolves on an accepted response, throws IngestApiError otherwise.
   */
  private async post(body: string): Promise<void> {
    const controller = new AbortController();

    const timeoutId = setTimeout(() => {
      controller.abort(new IngestApiError(`Request timed out after ${this.timeoutMs}ms`, 0));
    }, this.timeoutMs);

    const monitor = new LowSpeedMonitor({
      limitBytesPerSec: this.lowSpeedLimit,
      windowMs: this.lowSpeedTimeMs,
      onStall: () => {
        controller.abort(
          new IngestApiError(
            `Request stalled below ${this.lowSpeedLimit} bytes/s for ${this.lowSpeedTimeMs}ms`,
            0
          )
        );
      },
    });
    monitor.start();
    monitor.record(Buffer.byteLength(body));

    try {
      const response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body,
        signal: controller.signal,
      });
      const text = await readBody(response, monitor);

      if (response.status !== 200 && response.status !== 201) {
        throw new IngestApiError(`HTTP ${response.status}`, response.status);
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        throw new IngestApiError('Response body is not valid JSON', response.status);
      }

      const result = IngestResponseSchema.safeParse(parsed);
      if (!result.success) {
        throw new IngestApiError('Response body has no status field', response.status);
      }
      if (result.data.status !== 'ok') {
        throw new IngestApiError(
          `Unexpected response status "${result.data.status}"`,
          response.status
        );
      }
    } catch (error) {
      if (error instanceof IngestApiError) {
        throw error;
      }
      const reason: unknown = controller.signal.reason;
      if (reason instanceof IngestApiError) {
        throw reason;
      }
      throw new IngestApiError(`Request failed: ${errorMessage(error)}`, 0);
    } finally {
      clearTimeout(timeoutId);
      monitor.stop();
    }
  }
}
