/**
 * Call title filter
 *
 * Matching is case-insensitive substring search:
 * - 'demo and renewal'  -> every keyword must appear
 * - 'demo, renewal'     -> any keyword may appear (commas or spaces separate)
 * - ''                  -> everything matches
 */

import type { CallRecord } from '../../clients/gong/index.js';

export interface TitleMatcher {
  mode: 'all' | 'any';
  keywords: string[];
}

/**
 * Parse a filter expression into keywords and a match mode
 */
export function parseTitleFilter(filter: string): TitleMatcher {
  const normalized = filter.trim().toLowerCase();

  if (normalized.includes(' and ')) {
    return {
      mode: 'all',
      keywords: normalized
        .split(' and ')
        .map((keyword) => keyword.trim())
        .filter((keyword) => keyword.length > 0),
    };
  }

  return {
    mode: 'any',
    keywords: normalized
      .replace(/,/g, ' ')
      .split(/\s+/)
      .filter((keyword) => keyword.length > 0),
  };
}

export function matchesTitleFilter(title: string | null | undefined, filter: string): boolean {
  const { mode, keywords } = parseTitleFilter(filter);
  if (keywords.length === 0) {
    return true;
  }

  const haystack = (title ?? '').toLowerCase();
  return mode === 'all'
    ? keywords.every((keyword) => haystack.includes(keyword))
    : keywords.some((keyword) => haystack.includes(keyword));
}

/**
 * Keep the records whose title matches; no filter keeps everything
 */
export function filterByTitle(records: readonly CallRecord[], filter?: string): CallRecord[] {
  if (!filter) {
    return [...records];
  }
  return records.filter((record) => matchesTitleFilter(record.title, filter));
}
