/**
 * Firefox Profile Locator
 *
 * Finds the default profile through profiles.ini. Matching on
 * Name=default-release follows the standard distro Firefox install and is
 * not guaranteed for other installs (Flatpak, ESR, custom profiles).
 */

import { readFile } from 'node:fs/promises';
import type { Environment } from './env.js';
import { getPlacesDatabasePath, getProfilesIniPath } from './paths.js';
import { PlacemarksError, toErrorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('profile');

export const DEFAULT_PROFILE_NAME = 'default-release';

export interface IniSection {
  name: string;
  /** Keys are lower-cased. */
  entries: Map<string, string>;
}

/**
 * Minimal INI parsing: `[section]` headers and `key=value` lines.
 * Comment lines start with `;` or `#`; lines before the first section are ignored.
 */
export function parseIni(text: string): IniSection[] {
  const sections: IniSection[] = [];
  let current: IniSection | null = null;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith(';') || trimmed.startsWith('#')) continue;

    const header = /^\[(.+)\]$/.exec(trimmed);
    if (header?.[1] !== undefined) {
      current = { name: header[1].trim(), entries: new Map() };
      sections.push(current);
      continue;
    }

    const eq = trimmed.indexOf('=');
    if (!current || eq === -1) continue;
    const key = trimmed.slice(0, eq).trim().toLowerCase();
    current.entries.set(key, trimmed.slice(eq + 1).trim());
  }

  return sections;
}

/**
 * Path of the first section named `default-release`, if any.
 */
export function findDefaultProfile(sections: IniSection[]): string | undefined {
  for (const section of sections) {
    if (section.entries.get('name') === DEFAULT_PROFILE_NAME) {
      const profilePath = section.entries.get('path');
      if (profilePath) return profilePath;
    }
  }
  return undefined;
}

/**
 * Read profiles.ini and return the default profile's path.
 * A missing or unreadable registry is "no profile".
 */
export async function readDefaultProfilePath(env: Environment): Promise<string | undefined> {
  const iniPath = getProfilesIniPath(env);
  let text: string;
  try {
    text = await readFile(iniPath, 'utf-8');
  } catch (e) {
    log.debug(`Cannot read ${iniPath}: ${toErrorMessage(e)}`);
    return undefined;
  }
  return findDefaultProfile(parseIni(text));
}

export async function locateBookmarksDatabase(env: Environment): Promise<string> {
  const profilePath = await readDefaultProfilePath(env);
  if (profilePath === undefined) {
    throw new PlacemarksError(
      'profile_not_found',
      `No "${DEFAULT_PROFILE_NAME}" profile found in ${getProfilesIniPath(env)}`,
      'Set PLACEMARKS_FIREFOX_DIR to the directory that holds profiles.ini.',
      { firefoxDir: env.firefoxDir }
    );
  }
  const dbPath = getPlacesDatabasePath(env, profilePath);
  log.debug(`Using bookmarks database ${dbPath}`);
  return dbPath;
}
