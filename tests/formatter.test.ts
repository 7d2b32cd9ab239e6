import { describe, expect, it } from 'vitest';

import { formatBookmark, formatBookmarks, parseStyle } from '../src/formatter.js';
import { normalizedTitle, type Bookmark } from '../src/types.js';
import { PlacemarksError } from '../src/utils/errors.js';

const DECOMPOSED = 'Cafe\u0301';
const COMPOSED = 'Caf\u00e9';

const cafe: Bookmark = { url: 'https://example.com', title: DECOMPOSED };

describe('normalizedTitle', () => {
  it('composes combining diacritics without touching the stored title', () => {
    expect(normalizedTitle(cafe)).toBe(COMPOSED);
    expect(cafe.title).toBe(DECOMPOSED);
  });
});

describe('formatBookmark', () => {
  it('renders unified as a single org list link', () => {
    expect(formatBookmark(cafe, 'unified')).toBe(`- [[https://example.com][${COMPOSED}]]`);
  });

  it('renders split as a heading and an indented link', () => {
    expect(formatBookmark(cafe, 'split')).toBe(`* ${COMPOSED}\n  [[https://example.com]]`);
  });

  it('renders plain as the bare URL', () => {
    expect(formatBookmark(cafe, 'plain')).toBe('https://example.com');
  });

  it('never emits the decomposed title', () => {
    for (const style of ['unified', 'split'] as const) {
      const text = formatBookmark(cafe, style);
      expect(text).toContain(COMPOSED);
      expect(text).not.toContain(DECOMPOSED);
    }
  });
});

describe('parseStyle', () => {
  it('accepts the known styles', () => {
    expect(parseStyle('unified')).toBe('unified');
    expect(parseStyle('split')).toBe('split');
    expect(parseStyle('plain')).toBe('plain');
  });

  it('rejects anything else with unknown_style', () => {
    expect(() => parseStyle('weird')).toThrow(PlacemarksError);
    expect(() => parseStyle('weird')).toThrow('Unknown style: weird');
    expect(() => parseStyle('Unified')).toThrow('Unknown style: Unified');
  });
});

describe('formatBookmarks', () => {
  it('keeps order', () => {
    const bookmarks: Bookmark[] = [
      { url: 'https://b.example', title: 'B' },
      { url: 'https://a.example', title: 'A' },
    ];

    expect(formatBookmarks(bookmarks, 'plain')).toEqual(['https://b.example', 'https://a.example']);
  });

  it('rejects an unknown style even with nothing to format', () => {
    try {
      formatBookmarks([], 'weird');
      expect.unreachable('formatBookmarks should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(PlacemarksError);
      expect(e instanceof PlacemarksError && e.code).toBe('unknown_style');
    }
  });
});
