/**
 * Summary Sentence Templates
 *
 * One sentence per record kind, plus the profile header and the heart-rate
 * range. Values are interpolated verbatim.
 *
 * @module summary/templates
 */

import type { Profile } from '../schemas/profile.js';
import type {
  ActivityFields,
  WorkoutFields,
  NutritionFields,
  SleepFields,
} from '../schemas/records.js';

export function formatHeader(profile: Profile): string {
  return (
    `${profile.name} (${profile.age} years old ${profile.gender}, ` +
    `${profile.height} cm, ${profile.weight} kg, ${profile.fitness_level} fitness level)`
  );
}

export function formatActivity(a: ActivityFields): string {
  return (
    `did ${a.activity_type} for ${a.duration} minutes in ${a.weather} weather, ` +
    `burning ${a.calories_burned} calories, covering ${a.distance} km with ${a.steps} steps, ` +
    `avg HR ${a.heart_rate_avg} bpm (max ${a.heart_rate_max}).`
  );
}

export function formatWorkout(w: WorkoutFields): string {
  return (
    `Completed a ${w.workout_type} workout for ${w.duration} minutes, ` +
    `${w.sets} sets of ${w.reps} reps, burned ${w.calories_burned} calories.`
  );
}

export function formatNutrition(n: NutritionFields): string {
  return (
    `Ate ${n.calories} calories at ${n.meal_type} ` +
    `(${n.protein}g protein, ${n.carbs}g carbs, ${n.fat}g fat).`
  );
}

export function formatSleep(s: SleepFields): string {
  return (
    `Slept ${s.total_sleep} hours (deep ${s.deep_sleep}h, REM ${s.rem_sleep}h), ` +
    `quality ${s.sleep_quality}, resting HR ${s.resting_heart_rate} bpm.`
  );
}

/**
 * Heart-rate range sentence; min and max are joined by an en dash.
 */
export function formatHeartRateRange(min: number, max: number): string {
  return `Heart rate ranged ${min}–${max} bpm during the day.`;
}

export function formatUnknownUser(userId: string, date: string): string {
  return `Unknown user ${userId} on ${date}`;
}
