/**
 * Tests for the Day Aggregator
 *
 * Covers:
 * - Record validation and skipping
 * - Bucket keying and arrival order
 * - Partial flush threshold and flushability rule
 * - Final drain
 *
 * @module aggregator/aggregator.test
 */

import { describe, it, expect } from '@jest/globals';
import { DayAggregator, isFlushable } from './aggregator.js';
import type { DayBucket, FoldOutcome, TaggedRecord } from './types.js';

// ============================================================================
// Fixtures
// ============================================================================

function nutrition(userId: string, date: string, calories = 500): TaggedRecord {
  return {
    kind: 'nutrition',
    record: { user_id: userId, date, calories, meal_type: 'lunch', protein: 20, carbs: 60, fat: 15 },
  };
}

function activity(userId: string, date: string): TaggedRecord {
  return {
    kind: 'activity',
    record: {
      user_id: userId,
      date,
      activity_type: 'cycling',
      duration: 30,
      weather: 'cloudy',
      calories_burned: 250,
      distance: 10,
      steps: 0,
      heart_rate_avg: 130,
      heart_rate_max: 160,
    },
  };
}

function sleep(userId: string, date: string): TaggedRecord {
  return {
    kind: 'sleep',
    record: {
      user_id: userId,
      date,
      total_sleep: 8,
      deep_sleep: 2,
      rem_sleep: 1.5,
      sleep_quality: 'fair',
      resting_heart_rate: 58,
    },
  };
}

function workout(userId: string, date: string): TaggedRecord {
  return {
    kind: 'workout',
    record: {
      user_id: userId,
      date,
      workout_type: 'HIIT',
      duration: 20,
      sets: 5,
      reps: 12,
      calories_burned: 200,
    },
  };
}

function heartRate(userId: string, dateTime: string, value: number): TaggedRecord {
  return { kind: 'heart_rate', record: { user_id: userId, date_time: dateTime, value } };
}

function flushedOf(outcome: FoldOutcome): DayBucket[] {
  if (outcome.status !== 'folded') {
    throw new Error(`expected a fold, got ${outcome.reason}`);
  }
  return outcome.flushed;
}

// ============================================================================
// Folding
// ============================================================================

describe('DayAggregator folding', () => {
  it('renders each record into its bucket line', () => {
    const aggregator = new DayAggregator();

    aggregator.add(nutrition('u1', '2024-01-01'));
    const [bucket] = aggregator.drain();

    expect(bucket).toEqual({
      userId: 'u1',
      date: '2024-01-01',
      activities: [],
      workouts: [],
      nutrition: ['Ate 500 calories at lunch (20g protein, 60g carbs, 15g fat).'],
      sleep: [],
      heartRates: [],
    });
  });

  it('keeps arrival order within a kind', () => {
    const aggregator = new DayAggregator();

    aggregator.add(nutrition('u1', '2024-01-01', 300));
    aggregator.add(nutrition('u1', '2024-01-01', 700));
    aggregator.add(nutrition('u1', '2024-01-01', 100));
    const [bucket] = aggregator.drain();

    expect(bucket?.nutrition.map((line) => line.split(' ')[1])).toEqual(['300', '700', '100']);
  });

  it('keys buckets by user and date', () => {
    const aggregator = new DayAggregator();

    aggregator.add(nutrition('u1', '2024-01-01'));
    aggregator.add(nutrition('u1', '2024-01-02'));
    aggregator.add(nutrition('u2', '2024-01-01'));
    aggregator.add(sleep('u1', '2024-01-01'));

    expect(aggregator.openBuckets).toBe(3);
    const keys = aggregator.drain().map((b) => `${b.userId}/${b.date}`).sort();
    expect(keys).toEqual(['u1/2024-01-01', 'u1/2024-01-02', 'u2/2024-01-01']);
  });

  it('does not confuse ids that contain the separator', () => {
    const aggregator = new DayAggregator();

    aggregator.add(nutrition('a|b', 'c'));
    aggregator.add(nutrition('a', 'b|c'));

    expect(aggregator.openBuckets).toBe(2);
  });

  it('buckets date_time records under the day part', () => {
    const aggregator = new DayAggregator();

    aggregator.add(heartRate('u1', '2024-01-03 08:15:00', 64));
    const [bucket] = aggregator.drain();

    expect(bucket?.date).toBe('2024-01-03');
    expect(bucket?.heartRates).toEqual([64]);
  });

  it('collects every kind into its own list', () => {
    const aggregator = new DayAggregator();

    aggregator.add(activity('u1', 'd'));
    aggregator.add(workout('u1', 'd'));
    aggregator.add(sleep('u1', 'd'));
    aggregator.add(heartRate('u1', 'd 10:00', 70));
    const [bucket] = aggregator.drain();

    expect(bucket?.activities).toEqual([
      'did cycling for 30 minutes in cloudy weather, burning 250 calories, covering 10 km with 0 steps, avg HR 130 bpm (max 160).',
    ]);
    expect(bucket?.workouts).toEqual([
      'Completed a HIIT workout for 20 minutes, 5 sets of 12 reps, burned 200 calories.',
    ]);
    expect(bucket?.sleep).toEqual([
      'Slept 8 hours (deep 2h, REM 1.5h), quality fair, resting HR 58 bpm.',
    ]);
    expect(bucket?.heartRates).toEqual([70]);
  });

  it('counts measurements without creating a bucket', () => {
    const aggregator = new DayAggregator();

    const outcome = aggregator.add({
      kind: 'measurement',
      record: { user_id: 'u1', date: '2024-01-01', weight: 60 },
    });

    expect(outcome).toEqual({ status: 'folded', flushed: [] });
    expect(aggregator.recordCount).toBe(1);
    expect(aggregator.openBuckets).toBe(0);
  });
});

// ============================================================================
// Skipping
// ============================================================================

describe('DayAggregator skipping', () => {
  it('skips records without a date and touches no bucket', () => {
    const aggregator = new DayAggregator();

    const outcome = aggregator.add({ kind: 'heart_rate', record: { user_id: 'u1', value: 60 } });

    expect(outcome).toEqual({ status: 'skipped', reason: 'missing-date' });
    expect(aggregator.openBuckets).toBe(0);
    expect(aggregator.recordCount).toBe(0);
    expect(aggregator.skippedCount).toBe(1);
  });

  it('skips records with an empty date', () => {
    const aggregator = new DayAggregator();

    const outcome = aggregator.add(nutrition('u1', ''));

    expect(outcome.status).toBe('skipped');
    expect(aggregator.openBuckets).toBe(0);
  });

  it('skips records without a user_id', () => {
    const aggregator = new DayAggregator();

    expect(aggregator.add({ kind: 'heart_rate', record: { date: 'd', value: 1 } })).toEqual({
      status: 'skipped',
      reason: 'missing-user-id',
      detail: 'user_id: Required',
    });
    expect(aggregator.add(nutrition('', '2024-01-01'))).toEqual({
      status: 'skipped',
      reason: 'missing-user-id',
      detail: 'user_id: user_id must not be empty',
    });
  });

  it('skips non-object elements', () => {
    const aggregator = new DayAggregator();

    expect(aggregator.add({ kind: 'sleep', record: 42 })).toEqual({
      status: 'skipped',
      reason: 'not-an-object',
    });
    expect(aggregator.add({ kind: 'sleep', record: [1, 2] }).status).toBe('skipped');
  });

  it('skips records missing a rendered field', () => {
    const aggregator = new DayAggregator();

    const outcome = aggregator.add({
      kind: 'nutrition',
      record: { user_id: 'u1', date: 'd', calories: 1, meal_type: 'x', protein: 1, carbs: 1 },
    });

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'invalid-fields',
      detail: 'fat: must be a string or number',
    });
    expect(aggregator.openBuckets).toBe(0);
  });

  it('skips records whose rendered field is neither text nor a number', () => {
    const aggregator = new DayAggregator();

    const outcome = aggregator.add({
      kind: 'nutrition',
      record: { user_id: 'u1', date: 'd', calories: 1, meal_type: 'x', protein: 1, carbs: true, fat: 1 },
    });

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'invalid-fields',
      detail: 'carbs: must be a string or number',
    });
  });

  it('skips heart-rate samples that are not numbers', () => {
    const aggregator = new DayAggregator();

    const outcome = aggregator.add({ kind: 'heart_rate', record: { user_id: 'u1', date: 'd', value: '72' } });

    expect(outcome.status).toBe('skipped');
    expect(aggregator.openBuckets).toBe(0);
  });
});

// ============================================================================
// Flushing
// ============================================================================

describe('DayAggregator flushing', () => {
  it('rejects a non-positive threshold', () => {
    expect(() => new DayAggregator({ flushEvery: 0 })).toThrow('flushEvery must be a positive integer');
  });

  it('flushes exactly on the threshold record', () => {
    const aggregator = new DayAggregator({ flushEvery: 3 });

    expect(flushedOf(aggregator.add(nutrition('u1', 'd1')))).toEqual([]);
    expect(flushedOf(aggregator.add(nutrition('u2', 'd1')))).toEqual([]);
    const flushed = flushedOf(aggregator.add(sleep('u3', 'd1')));

    expect(flushed.map((b) => b.userId).sort()).toEqual(['u1', 'u2']);
    expect(aggregator.flushCount).toBe(1);
    expect(aggregator.openBuckets).toBe(1);
  });

  it('attempts a flush immediately after the 50,000th record by default', () => {
    const aggregator = new DayAggregator();

    for (let i = 0; i < 49_999; i++) {
      aggregator.add(heartRate('u1', '2024-01-01 00:00', 60));
    }
    expect(aggregator.flushCount).toBe(0);

    aggregator.add(nutrition('u2', '2024-01-01'));

    expect(aggregator.flushCount).toBe(1);
  });

  it('does not count skipped records toward the threshold', () => {
    const aggregator = new DayAggregator({ flushEvery: 2 });

    aggregator.add(nutrition('u1', 'd1'));
    aggregator.add({ kind: 'nutrition', record: { user_id: 'u1' } });

    expect(aggregator.flushCount).toBe(0);
  });

  it('keeps heart-rate-only buckets through partial flushes', () => {
    const aggregator = new DayAggregator({ flushEvery: 1 });

    for (const value of [60, 72, 88]) {
      expect(flushedOf(aggregator.add(heartRate('u1', '2024-01-04 09:00', value)))).toEqual([]);
    }

    expect(aggregator.flushCount).toBe(3);
    const [bucket] = aggregator.drain();
    expect(bucket?.heartRates).toEqual([60, 72, 88]);
  });

  it('keeps sleep-only and workout-only buckets through partial flushes', () => {
    const aggregator = new DayAggregator({ flushEvery: 1 });

    expect(flushedOf(aggregator.add(sleep('u1', 'd1')))).toEqual([]);
    expect(flushedOf(aggregator.add(workout('u2', 'd1')))).toEqual([]);
    expect(aggregator.openBuckets).toBe(2);
  });

  it('flushes a bucket once activities arrive for it', () => {
    const aggregator = new DayAggregator({ flushEvery: 1 });

    aggregator.add(sleep('u1', 'd1'));
    const flushed = flushedOf(aggregator.add(activity('u1', 'd1')));

    expect(flushed).toHaveLength(1);
    expect(flushed[0]?.sleep).toHaveLength(1);
    expect(flushed[0]?.activities).toHaveLength(1);
    expect(aggregator.openBuckets).toBe(0);
  });

  it('starts a fresh bucket for a key that was already flushed', () => {
    const aggregator = new DayAggregator({ flushEvery: 1 });

    aggregator.add(nutrition('u1', 'd1'));
    aggregator.add(heartRate('u1', 'd1 12:00', 75));

    const [bucket] = aggregator.drain();
    expect(bucket?.nutrition).toEqual([]);
    expect(bucket?.heartRates).toEqual([75]);
  });

  it('drains every remaining bucket and empties the map', () => {
    const aggregator = new DayAggregator();

    aggregator.add(sleep('u1', 'd1'));
    aggregator.add(heartRate('u2', 'd2 08:00', 66));
    aggregator.add(nutrition('u3', 'd3'));

    expect(aggregator.drain()).toHaveLength(3);
    expect(aggregator.openBuckets).toBe(0);
    expect(aggregator.drain()).toEqual([]);
  });
});

describe('isFlushable', () => {
  const empty: DayBucket = {
    userId: 'u',
    date: 'd',
    activities: [],
    workouts: [],
    nutrition: [],
    sleep: [],
    heartRates: [],
  };

  it('requires activities or nutrition', () => {
    expect(isFlushable(empty)).toBe(false);
    expect(isFlushable({ ...empty, activities: ['a'] })).toBe(true);
    expect(isFlushable({ ...empty, nutrition: ['n'] })).toBe(true);
    expect(isFlushable({ ...empty, workouts: ['w'], sleep: ['s'], heartRates: [1] })).toBe(false);
  });
});
