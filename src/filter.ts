import type { Bookmark } from './types.js';
import { PlacemarksError, toErrorMessage } from './utils/errors.js';

export type BookmarkPredicate = (bookmark: Bookmark) => boolean;

/**
 * Case-insensitive regex search over the URL and the title as stored
 * (not the normalized title). Plain text works as a substring match.
 */
export function compileFilter(pattern: string): BookmarkPredicate {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, 'i');
  } catch (e) {
    throw new PlacemarksError('invalid_pattern', `Invalid filter pattern "${pattern}": ${toErrorMessage(e)}`, undefined, {
      pattern,
    });
  }
  return (bookmark) => regex.test(bookmark.url) || regex.test(bookmark.title);
}

export function filterBookmarks(bookmarks: readonly Bookmark[], pattern?: string): Bookmark[] {
  if (pattern === undefined) {
    return [...bookmarks];
  }
  return bookmarks.filter(compileFilter(pattern));
}
