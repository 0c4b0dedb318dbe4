/**
 * Pipeline Types
 *
 * Types shared between the reader, aggregator, renderer and delivery
 * stages of an ingestion run.
 *
 * @module pipeline/types
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Sink for human-readable progress output.
 *
 * Library modules never print directly; the CLI supplies an implementation
 * backed by its BaseCommand.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger that discards everything. Default for library callers and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Summaries and Delivery
// ============================================================================

/**
 * One rendered summary, bound to the day it describes.
 * Immutable once produced; handed from the driver to the delivery workers.
 */
export interface SummaryItem {
  readonly userId: string;
  readonly date: string;
  readonly text: string;
}

/**
 * Outcome of delivering one summary (after all retries).
 */
export interface DeliveryResult {
  userId: string;
  date: string;
  success: boolean;
  /** HTTP attempts made (0 in dry-run mode) */
  attempts: number;
  /** Last failure reason, present when success is false */
  error?: string;
}

/**
 * Aggregate delivery statistics for a run.
 */
export interface DeliveryStats {
  /** Summaries handed to the dispatcher */
  submitted: number;
  /** Summaries confirmed by the endpoint */
  delivered: number;
  /** Summaries that exhausted their attempts */
  failed: number;
  /** HTTP attempts across all summaries */
  attempts: number;
  /** Batches dispatched */
  batches: number;
  /** `user_id/date` keys of failed summaries */
  failedKeys: string[];
}
