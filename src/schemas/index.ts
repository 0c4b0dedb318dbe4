/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the profile, record and ingest API schemas.
 */

// ============================================================================
// Profiles
// ============================================================================

export { ProfileSchema, ProfileListSchema, type Profile } from './profile.js';

// ============================================================================
// Records
// ============================================================================

export {
  RecordKindSchema,
  RecordOwnerSchema,
  ActivityFieldsSchema,
  WorkoutFieldsSchema,
  NutritionFieldsSchema,
  SleepFieldsSchema,
  HeartRateFieldsSchema,
  type RecordKind,
  type RenderedValue,
  type ActivityFields,
  type WorkoutFields,
  type NutritionFields,
  type SleepFields,
  type HeartRateFields,
} from './records.js';

// ============================================================================
// Ingest API
// ============================================================================

export {
  SUMMARY_TYPE,
  IngestMetaSchema,
  IngestPayloadSchema,
  IngestResponseSchema,
  type IngestMeta,
  type IngestPayload,
  type IngestResponse,
} from './ingest.js';
