/**
 * Bookmark Extractor
 *
 * Reads one folder of places.sqlite. Firefox keeps the live database
 * locked, so queries run against a private read-only copy that is removed
 * on every exit path.
 */

import { copyFile, mkdtemp, rm } from 'node:fs/promises';
import path from 'node:path';
import Database from 'better-sqlite3';
import { PLACES_DB_FILE } from './paths.js';
import type { Bookmark } from './types.js';
import { PlacemarksError, isNotFoundError, isPermissionError, toErrorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('extractor');

/** moz_bookmarks.type for folders */
const TYPE_FOLDER = 2;

const FOLDER_QUERY = `
  SELECT id
  FROM moz_bookmarks
  WHERE type = ${TYPE_FOLDER} AND title = ?
  ORDER BY id
`;

// No ORDER BY: rows come back in the engine's storage order.
// Separators and subfolders have no fk and drop out of the join.
const ENTRIES_QUERY = `
  SELECT moz_places.url AS url, moz_bookmarks.title AS title
  FROM moz_bookmarks
  INNER JOIN moz_places ON moz_places.id = moz_bookmarks.fk
  WHERE moz_bookmarks.parent = ?
`;

interface FolderRow {
  id: number;
}

interface EntryRow {
  url: string;
  title: string | null;
}

const WAL_SUFFIX = '-wal';

function unreadable(filePath: string, e: unknown): PlacemarksError {
  const reason = isNotFoundError(e) ? 'not found' : isPermissionError(e) ? 'permission denied' : toErrorMessage(e);
  return new PlacemarksError('database_unreadable', `Cannot read bookmarks database ${filePath}: ${reason}`, undefined, {
    sourcePath: filePath,
  });
}

export interface SnapshotOptions {
  /** Parent for the scratch directory */
  tmpDir: string;
}

/**
 * Copy `sourcePath`, and its `-wal` file when there is one, into a scratch
 * directory, open the copy read-only and run `fn` against it. The
 * connection and the scratch directory are gone by the time the returned
 * promise settles.
 */
export async function withDatabaseSnapshot<T>(
  sourcePath: string,
  fn: (db: Database.Database) => T,
  options: SnapshotOptions
): Promise<T> {
  const scratchDir = await mkdtemp(path.join(options.tmpDir, 'placemarks-'));
  try {
    const copyPath = path.join(scratchDir, PLACES_DB_FILE);
    try {
      await copyFile(sourcePath, copyPath);
    } catch (e) {
      throw unreadable(sourcePath, e);
    }
    log.debug(`Copied ${sourcePath} to ${copyPath}`);

    // A running Firefox keeps recent writes in the write-ahead log
    const walPath = `${sourcePath}${WAL_SUFFIX}`;
    try {
      await copyFile(walPath, `${copyPath}${WAL_SUFFIX}`);
      log.debug(`Copied ${walPath}`);
    } catch (e) {
      if (!isNotFoundError(e)) throw unreadable(walPath, e);
    }

    let db: Database.Database | null = null;
    try {
      db = new Database(copyPath, { readonly: true, fileMustExist: true });
      return fn(db);
    } catch (e) {
      if (e instanceof Database.SqliteError) {
        throw new PlacemarksError(
          'invalid_database',
          `${sourcePath} is not a Firefox bookmarks database: ${e.message}`,
          undefined,
          { sourcePath, sqliteCode: e.code }
        );
      }
      throw e;
    } finally {
      db?.close();
    }
  } finally {
    await rm(scratchDir, { recursive: true, force: true });
  }
}

/**
 * Id of the folder titled `folder`. With duplicates, the first in id order wins.
 */
export function findFolderId(db: Database.Database, folder: string): number {
  const rows = db.prepare<[string], FolderRow>(FOLDER_QUERY).all(folder);
  const first = rows[0];
  if (!first) {
    throw new PlacemarksError(
      'folder_not_found',
      `Bookmark folder not found: ${folder}`,
      'Folder names are case-sensitive; the bookmarks toolbar is "toolbar".',
      { folder }
    );
  }
  if (rows.length > 1) {
    log.warn(`${rows.length} folders are named "${folder}"; using the first (id ${first.id})`);
  }
  return first.id;
}

export function queryFolderBookmarks(db: Database.Database, folder: string): Bookmark[] {
  const folderId = findFolderId(db, folder);
  const rows = db.prepare<[number], EntryRow>(ENTRIES_QUERY).all(folderId);
  return rows.map((row) => ({ url: row.url, title: row.title ?? '' }));
}

export async function extractBookmarks(dbPath: string, folder: string, options: SnapshotOptions): Promise<Bookmark[]> {
  const bookmarks = await withDatabaseSnapshot(dbPath, (db) => queryFolderBookmarks(db, folder), options);
  log.debug(`Read ${bookmarks.length} bookmark(s) from "${folder}"`);
  return bookmarks;
}
