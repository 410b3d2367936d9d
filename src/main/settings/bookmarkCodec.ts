/**
 * Bookmark list encoding: one `Title|URL` string per bookmark.
 *
 * Decoding splits on the first `|`. Entries without one predate titles and
 * decode with the whole entry as both title and URL.
 */
import type { Bookmark } from '../../shared/types';

export const BOOKMARK_SEPARATOR = '|';

/**
 * Build a bookmark; an empty or missing title falls back to the URL.
 */
export function createBookmark(url: string, title?: string): Bookmark {
  return { title: title ? title : url, url };
}

export function encodeBookmark(bookmark: Bookmark): string {
  const title = bookmark.title || bookmark.url;
  return `${title}${BOOKMARK_SEPARATOR}${bookmark.url}`;
}

export function decodeBookmark(entry: string): Bookmark {
  const index = entry.indexOf(BOOKMARK_SEPARATOR);
  if (index === -1) {
    return { title: entry, url: entry };
  }
  return createBookmark(entry.slice(index + 1), entry.slice(0, index));
}

export function encodeBookmarks(bookmarks: readonly Bookmark[]): string[] {
  return bookmarks.map(encodeBookmark);
}

/**
 * Non-string entries are skipped.
 */
export function decodeBookmarks(entries: readonly unknown[]): Bookmark[] {
  const bookmarks: Bookmark[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      bookmarks.push(decodeBookmark(entry));
    }
  }
  return bookmarks;
}
