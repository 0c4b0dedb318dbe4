/**
 * Ingest API Schemas - request envelope and response body of the
 * vector-indexing endpoint
 */

import { z } from 'zod';

export const SUMMARY_TYPE = 'daily_summary';

export const IngestMetaSchema = z.object({
  user_id: z.string().min(1),
  date: z.string().min(1),
  type: z.literal(SUMMARY_TYPE),
});

export type IngestMeta = z.infer<typeof IngestMetaSchema>;

/**
 * Body POSTed for every summary.
 */
export const IngestPayloadSchema = z.object({
  text: z.string(),
  meta: IngestMetaSchema,
});

export type IngestPayload = z.infer<typeof IngestPayloadSchema>;

/**
 * Success body; a delivery counts only when `status` is "ok".
 */
export const IngestResponseSchema = z
  .object({
    status: z.string(),
  })
  .passthrough();

export type IngestResponse = z.infer<typeof IngestResponseSchema>;
