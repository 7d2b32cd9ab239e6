/**
 * Centralized Path Management
 *
 * Browser-convention locations, derived from an Environment rather than
 * from globals.
 */

import path from 'node:path';
import type { Environment } from './env.js';

/**
 * Bookmarks database file inside a profile directory
 */
export const PLACES_DB_FILE = 'places.sqlite';

/**
 * Profile registry file inside the Firefox root
 */
export const PROFILES_INI_FILE = 'profiles.ini';

export function getProfilesIniPath(env: Environment): string {
  return path.join(env.firefoxDir, PROFILES_INI_FILE);
}

/**
 * Get the bookmarks database path for a profile.
 * Absolute profile paths (IsRelative=0 entries) are used as-is.
 */
export function getPlacesDatabasePath(env: Environment, profilePath: string): string {
  return path.resolve(env.firefoxDir, profilePath, PLACES_DB_FILE);
}
