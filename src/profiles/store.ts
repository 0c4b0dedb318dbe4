/**
 * Profile Store
 *
 * Loads users.json once at startup and answers lookups by user_id.
 * Read-only after load.
 *
 * @module profiles/store
 */

import * as path from 'node:path';
import { readJson } from '../storage/files.js';
import { ProfileListSchema, type Profile } from '../schemas/profile.js';

/** File holding the profile array inside the data directory */
export const PROFILES_FILE = 'users.json';

/**
 * Raised when users.json cannot be opened, parsed or validated.
 * Always fatal to a run.
 */
export class ProfileLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'ProfileLoadError';
  }
}

/**
 * Immutable mapping of user_id to Profile.
 *
 * @example
 * ```typescript
 * const store = await ProfileStore.load('/data');
 * const profile = store.lookup('u1');
 * ```
 */
export class ProfileStore {
  private readonly profiles: ReadonlyMap<string, Readonly<Profile>>;

  constructor(profiles: Iterable<Profile>) {
    const map = new Map<string, Readonly<Profile>>();
    // Later entries replace earlier ones with the same user_id
    for (const profile of profiles) {
      map.set(profile.user_id, Object.freeze({ ...profile }));
    }
    this.profiles = map;
  }

  /**
   * Load and validate `<dataDir>/users.json`.
   *
   * @throws ProfileLoadError if the file is missing, not JSON, or any entry
   *   is not a valid profile
   */
  static async load(dataDir: string): Promise<ProfileStore> {
    const filePath = path.join(dataDir, PROFILES_FILE);

    let raw: unknown;
    try {
      raw = await readJson(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProfileLoadError(`Failed to load ${PROFILES_FILE}: ${reason}`, filePath);
    }

    const parsed = ProfileListSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ProfileLoadError(
        `Invalid ${PROFILES_FILE}${where}: ${issue?.message ?? 'unknown error'}`,
        filePath
      );
    }

    return new ProfileStore(parsed.data);
  }

  lookup(userId: string): Readonly<Profile> | undefined {
    return this.profiles.get(userId);
  }

  get size(): number {
    return this.profiles.size;
  }
}
