/**
 * Day Aggregator
 *
 * Folds tagged records into per-(user, day) buckets and decides when
 * buckets leave memory.
 *
 * Every `flushEvery` folded records a partial flush releases the buckets
 * that already hold activities or nutrition; buckets with only workouts,
 * sleep or heart-rate samples wait, since later streams may still add to
 * them. `drain()` releases everything at end of input.
 *
 * @module aggregator/aggregator
 */

import type { z } from 'zod';
import {
  RecordOwnerSchema,
  ActivityFieldsSchema,
  WorkoutFieldsSchema,
  NutritionFieldsSchema,
  SleepFieldsSchema,
  HeartRateFieldsSchema,
} from '../schemas/records.js';
import { extractDate } from '../ingest/date.js';
import { formatActivity, formatWorkout, formatNutrition, formatSleep } from '../summary/templates.js';
import {
  FLUSH_EVERY,
  type AggregatorOptions,
  type DayBucket,
  type FoldOutcome,
  type SkipReason,
  type TaggedRecord,
} from './types.js';

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map key for a bucket. JSON encoding keeps keys distinct whatever
 * characters the user_id or date contain.
 */
function bucketKey(userId: string, date: string): string {
  return JSON.stringify([userId, date]);
}

function createBucket(userId: string, date: string): DayBucket {
  return {
    userId,
    date,
    activities: [],
    workouts: [],
    nutrition: [],
    sleep: [],
    heartRates: [],
  };
}

/**
 * Whether a bucket may leave on a partial flush.
 */
export function isFlushable(bucket: DayBucket): boolean {
  return bucket.activities.length > 0 || bucket.nutrition.length > 0;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

// ============================================================================
// DayAggregator
// ============================================================================

/**
 * Owner of the (user_id, date) -> DayBucket map.
 *
 * Single writer: only the driver calls into it, so no locking is needed.
 *
 * @example
 * ```typescript
 * const aggregator = new DayAggregator();
 * for await (const tagged of readRecords(dataDir)) {
 *   const outcome = aggregator.add(tagged);
 *   if (outcome.status === 'folded') ship(outcome.flushed);
 * }
 * ship(aggregator.drain());
 * ```
 */
export class DayAggregator {
  private readonly flushEvery: number;
  private readonly buckets = new Map<string, DayBucket>();
  private folded = 0;
  private skipped = 0;
  private partialFlushes = 0;

  constructor(options: AggregatorOptions = {}) {
    const { flushEvery = FLUSH_EVERY } = options;
    if (!Number.isInteger(flushEvery) || flushEvery < 1) {
      throw new Error('flushEvery must be a positive integer');
    }
    this.flushEvery = flushEvery;
  }

  /**
   * Fold one record into its bucket.
   *
   * Records without an owner, without a date, or with missing rendered
   * fields are skipped and touch nothing. When the fold count reaches a
   * multiple of `flushEvery`, the flushable buckets are returned.
   */
  add(tagged: TaggedRecord): FoldOutcome {
    const { kind, record } = tagged;

    if (!isPlainObject(record)) {
      return this.skip('not-an-object');
    }

    const owner = RecordOwnerSchema.safeParse(record);
    if (!owner.success) {
      return this.skip('missing-user-id', describeIssues(owner.error));
    }

    const date = extractDate(record);
    if (date === '') {
      return this.skip('missing-date');
    }

    const userId = owner.data.user_id;

    switch (kind) {
      case 'activity': {
        const fields = ActivityFieldsSchema.safeParse(record);
        if (!fields.success) return this.skip('invalid-fields', describeIssues(fields.error));
        this.bucketFor(userId, date).activities.push(formatActivity(fields.data));
        break;
      }
      case 'workout': {
        const fields = WorkoutFieldsSchema.safeParse(record);
        if (!fields.success) return this.skip('invalid-fields', describeIssues(fields.error));
        this.bucketFor(userId, date).workouts.push(formatWorkout(fields.data));
        break;
      }
      case 'nutrition': {
        const fields = NutritionFieldsSchema.safeParse(record);
        if (!fields.success) return this.skip('invalid-fields', describeIssues(fields.error));
        this.bucketFor(userId, date).nutrition.push(formatNutrition(fields.data));
        break;
      }
      case 'sleep': {
        const fields = SleepFieldsSchema.safeParse(record);
        if (!fields.success) return this.skip('invalid-fields', describeIssues(fields.error));
        this.bucketFor(userId, date).sleep.push(formatSleep(fields.data));
        break;
      }
      case 'heart_rate': {
        const fields = HeartRateFieldsSchema.safeParse(record);
        if (!fields.success) return this.skip('invalid-fields', describeIssues(fields.error));
        this.bucketFor(userId, date).heartRates.push(fields.data.value);
        break;
      }
      case 'measurement':
        // Counted toward the flush threshold; not rendered
        break;
    }

    this.folded++;

    const flushed = this.folded % this.flushEvery === 0 ? this.flushCompleted() : [];
    return { status: 'folded', flushed };
  }

  /**
   * Remove and return every bucket that holds activities or nutrition.
   */
  flushCompleted(): DayBucket[] {
    this.partialFlushes++;
    const out: DayBucket[] = [];

    for (const [key, bucket] of this.buckets) {
      if (isFlushable(bucket)) {
        out.push(bucket);
        this.buckets.delete(key);
      }
    }

    return out;
  }

  /**
   * Remove and return all remaining buckets (end of input).
   */
  drain(): DayBucket[] {
    const out = [...this.buckets.values()];
    this.buckets.clear();
    return out;
  }

  /** Records folded so far */
  get recordCount(): number {
    return this.folded;
  }

  /** Records dropped so far */
  get skippedCount(): number {
    return this.skipped;
  }

  /** Partial flushes attempted so far */
  get flushCount(): number {
    return this.partialFlushes;
  }

  /** Buckets currently held */
  get openBuckets(): number {
    return this.buckets.size;
  }

  private bucketFor(userId: string, date: string): DayBucket {
    const key = bucketKey(userId, date);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = createBucket(userId, date);
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  private skip(reason: SkipReason, detail?: string): FoldOutcome {
    this.skipped++;
    return detail === undefined ? { status: 'skipped', reason } : { status: 'skipped', reason, detail };
  }
}
