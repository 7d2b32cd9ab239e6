/**
 * Shared types for placemarks.
 */

// ============================================
// Bookmarks
// ============================================

/** One row from the bookmarks database. */
export interface Bookmark {
  readonly url: string;
  /** As stored by Firefox; may hold decomposed diacritics. */
  readonly title: string;
}

/** Title in NFC form. Derived on demand, never stored. */
export function normalizedTitle(bookmark: Bookmark): string {
  return bookmark.title.normalize('NFC');
}

// ============================================
// Settings
// ============================================

export const OUTPUT_STYLES = ['unified', 'split', 'plain'] as const;

export type OutputStyle = (typeof OUTPUT_STYLES)[number];

export interface Settings {
  clipboard: boolean;
  /** Raw value; checked against OUTPUT_STYLES only when formatting. */
  style: string;
  folder: string;
  filter?: string;
}

/** One configuration tier: defaults, config file or command-line flags. */
export type SettingsLayer = Partial<Settings>;

export interface CliOptions {
  /** Only the flags that were explicitly given. */
  flags: SettingsLayer;
  help: boolean;
  verbose: boolean;
}
