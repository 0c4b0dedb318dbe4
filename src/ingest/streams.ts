/**
 * Input Streams
 *
 * The record files read after users.json, in processing order.
 *
 * @module ingest/streams
 */

import type { RecordKind } from '../schemas/records.js';

/**
 * One input file and the kind of record it holds.
 */
export interface StreamSource {
  file: string;
  kind: RecordKind;
}

export const STREAMS: readonly StreamSource[] = [
  { file: 'measurements.json', kind: 'measurement' },
  { file: 'activities.json', kind: 'activity' },
  { file: 'workouts.json', kind: 'workout' },
  { file: 'sleep.json', kind: 'sleep' },
  { file: 'nutrition.json', kind: 'nutrition' },
  { file: 'heart_rate.json', kind: 'heart_rate' },
];
