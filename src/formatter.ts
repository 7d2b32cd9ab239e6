/**
 * Org-mode rendering of bookmarks.
 */

import { OUTPUT_STYLES, normalizedTitle, type Bookmark, type OutputStyle } from './types.js';
import { PlacemarksError } from './utils/errors.js';

function isOutputStyle(value: string): value is OutputStyle {
  return OUTPUT_STYLES.some((style) => style === value);
}

export function parseStyle(value: string): OutputStyle {
  if (!isOutputStyle(value)) {
    throw new PlacemarksError(
      'unknown_style',
      `Unknown style: ${value}`,
      `Use one of: ${OUTPUT_STYLES.join(', ')}.`,
      { style: value }
    );
  }
  return value;
}

export function formatBookmark(bookmark: Bookmark, style: OutputStyle): string {
  switch (style) {
    case 'plain':
      return bookmark.url;
    case 'split':
      return `* ${normalizedTitle(bookmark)}\n  [[${bookmark.url}]]`;
    case 'unified':
      return `- [[${bookmark.url}][${normalizedTitle(bookmark)}]]`;
  }
}

/**
 * The style is checked up front, so an unknown style fails even for an
 * empty folder.
 */
export function formatBookmarks(bookmarks: readonly Bookmark[], style: string): string[] {
  const parsed = parseStyle(style);
  return bookmarks.map((bookmark) => formatBookmark(bookmark, parsed));
}
