/**
 * Summary Renderer
 *
 * Turns a profile and a day bucket into the single text blob that is
 * indexed for that day. Pure and deterministic.
 *
 * @module summary/renderer
 */

import type { Profile } from '../schemas/profile.js';
import type { DayBucket } from '../aggregator/types.js';
import type { SummaryItem } from '../pipeline/types.js';
import { formatHeader, formatHeartRateRange, formatUnknownUser } from './templates.js';

/**
 * Lowest and highest sample, or undefined for an empty list.
 */
export function heartRateRange(samples: readonly number[]): { min: number; max: number } | undefined {
  if (samples.length === 0) {
    return undefined;
  }

  let min = Infinity;
  let max = -Infinity;
  for (const sample of samples) {
    if (sample < min) min = sample;
    if (sample > max) max = sample;
  }
  return { min, max };
}

/**
 * Render the daily summary text.
 *
 * Order: header, activities, workouts, nutrition, sleep, heart-rate range,
 * separated by single spaces. An unknown profile yields a placeholder.
 *
 * @example
 * ```typescript
 * renderSummary(profile, bucket);
 * // "A (30 years old f, 170 cm, 60 kg, moderate fitness level) Ate 500 calories at ..."
 * ```
 */
export function renderSummary(profile: Profile | undefined, bucket: DayBucket): string {
  if (!profile) {
    return formatUnknownUser(bucket.userId, bucket.date);
  }

  const parts = [
    formatHeader(profile),
    ...bucket.activities,
    ...bucket.workouts,
    ...bucket.nutrition,
    ...bucket.sleep,
  ];

  const range = heartRateRange(bucket.heartRates);
  if (range) {
    parts.push(formatHeartRateRange(range.min, range.max));
  }

  return parts.join(' ');
}

/**
 * Render a bucket into the immutable item handed to delivery.
 */
export function toSummaryItem(profile: Profile | undefined, bucket: DayBucket): SummaryItem {
  return Object.freeze({
    userId: bucket.userId,
    date: bucket.date,
    text: renderSummary(profile, bucket),
  });
}
