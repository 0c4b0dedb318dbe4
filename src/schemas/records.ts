/**
 * Record Schemas - the fields each telemetry stream contributes to a summary
 *
 * Only fields that are rendered are validated; anything else on a record is
 * ignored.
 */

import { z } from 'zod';

// ============================================
// Record Kinds
// ============================================

export const RecordKindSchema = z.enum([
  'measurement',
  'activity',
  'workout',
  'sleep',
  'nutrition',
  'heart_rate',
]);

export type RecordKind = z.infer<typeof RecordKindSchema>;

// ============================================
// Shared
// ============================================

/**
 * A value interpolated into a summary sentence as-is.
 */
const RenderedValueSchema = z.union([z.string(), z.number()], {
  errorMap: () => ({ message: 'must be a string or number' }),
});

export type RenderedValue = z.infer<typeof RenderedValueSchema>;

/**
 * Every record must name its owner.
 */
export const RecordOwnerSchema = z.object({
  user_id: z.string().min(1, 'user_id must not be empty'),
});

// ============================================
// Per-kind Fields
// ============================================

export const ActivityFieldsSchema = z.object({
  activity_type: RenderedValueSchema,
  duration: RenderedValueSchema,
  weather: RenderedValueSchema,
  calories_burned: RenderedValueSchema,
  distance: RenderedValueSchema,
  steps: RenderedValueSchema,
  heart_rate_avg: RenderedValueSchema,
  heart_rate_max: RenderedValueSchema,
});

export type ActivityFields = z.infer<typeof ActivityFieldsSchema>;

export const WorkoutFieldsSchema = z.object({
  workout_type: RenderedValueSchema,
  duration: RenderedValueSchema,
  sets: RenderedValueSchema,
  reps: RenderedValueSchema,
  calories_burned: RenderedValueSchema,
});

export type WorkoutFields = z.infer<typeof WorkoutFieldsSchema>;

export const NutritionFieldsSchema = z.object({
  calories: RenderedValueSchema,
  meal_type: RenderedValueSchema,
  protein: RenderedValueSchema,
  carbs: RenderedValueSchema,
  fat: RenderedValueSchema,
});

export type NutritionFields = z.infer<typeof NutritionFieldsSchema>;

export const SleepFieldsSchema = z.object({
  total_sleep: RenderedValueSchema,
  deep_sleep: RenderedValueSchema,
  rem_sleep: RenderedValueSchema,
  sleep_quality: RenderedValueSchema,
  resting_heart_rate: RenderedValueSchema,
});

export type SleepFields = z.infer<typeof SleepFieldsSchema>;

export const HeartRateFieldsSchema = z.object({
  value: z.number().finite(),
});

export type HeartRateFields = z.infer<typeof HeartRateFieldsSchema>;
