/**
 * Aggregator Types
 *
 * The per-day accumulator and the options of the day aggregator.
 *
 * @module aggregator/types
 */

import type { RecordKind } from '../schemas/records.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Records folded between partial flushes.
 */
export const FLUSH_EVERY = 50_000;

// ============================================================================
// Day Buckets
// ============================================================================

/**
 * Everything recorded for one user on one day.
 *
 * Line arrays hold pre-rendered sentences in arrival order; heart-rate
 * samples are kept raw and summarised at render time.
 */
export interface DayBucket {
  readonly userId: string;
  readonly date: string;
  readonly activities: string[];
  readonly workouts: string[];
  readonly nutrition: string[];
  readonly sleep: string[];
  readonly heartRates: number[];
}

/**
 * A parsed element of an input stream, tagged with the stream it came from.
 */
export interface TaggedRecord {
  kind: RecordKind;
  record: unknown;
}

/**
 * Why a record was dropped without touching any bucket.
 */
export type SkipReason = 'not-an-object' | 'missing-user-id' | 'missing-date' | 'invalid-fields';

/**
 * Result of folding one record.
 */
export type FoldOutcome =
  | { status: 'folded'; flushed: DayBucket[] }
  | { status: 'skipped'; reason: SkipReason; detail?: string };

/**
 * Options for DayAggregator.
 */
export interface AggregatorOptions {
  /** Records between partial flushes (default: 50,000) */
  flushEvery?: number;
}
