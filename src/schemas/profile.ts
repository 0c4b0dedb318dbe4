/**
 * Profile Schema - demographic header data for each user
 */

import { z } from 'zod';

/**
 * A user profile as stored in users.json.
 * Heights are centimetres, weights kilograms.
 */
export const ProfileSchema = z.object({
  user_id: z.string().min(1),
  name: z.string(),
  age: z.number().int(),
  gender: z.string(),
  height: z.number(),
  weight: z.number(),
  fitness_level: z.string(),
});

export type Profile = z.infer<typeof ProfileSchema>;

/**
 * The whole users.json file: a top-level array of profiles.
 */
export const ProfileListSchema = z.array(ProfileSchema);
