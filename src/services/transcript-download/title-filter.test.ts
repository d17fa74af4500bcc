/**
 * Tests for the call title filter
 */

import { describe, it, expect } from 'vitest';
import { filterByTitle, matchesTitleFilter, parseTitleFilter } from './title-filter.js';

describe('parseTitleFilter', () => {
  it('should require every keyword when joined with and', () => {
    expect(parseTitleFilter(' Demo AND Renewal ')).toEqual({
      mode: 'all',
      keywords: ['demo', 'renewal'],
    });
  });

  it('should accept any keyword separated by commas or spaces', () => {
    expect(parseTitleFilter('demo, renewal  kickoff')).toEqual({
      mode: 'any',
      keywords: ['demo', 'renewal', 'kickoff'],
    });
  });
});

describe('matchesTitleFilter', () => {
  it('should match all keywords case-insensitively', () => {
    expect(matchesTitleFilter('Acme Renewal Demo', 'demo and renewal')).toBe(true);
    expect(matchesTitleFilter('Acme Demo', 'demo and renewal')).toBe(false);
  });

  it('should match any keyword', () => {
    expect(matchesTitleFilter('Weekly Kickoff', 'demo, kickoff')).toBe(true);
    expect(matchesTitleFilter('Weekly sync', 'demo, kickoff')).toBe(false);
  });

  it('should match everything with an empty filter', () => {
    expect(matchesTitleFilter('Anything', '   ')).toBe(true);
    expect(matchesTitleFilter(null, '')).toBe(true);
  });

  it('should treat a missing title as empty', () => {
    expect(matchesTitleFilter(undefined, 'demo')).toBe(false);
  });
});

describe('filterByTitle', () => {
  const records = [
    { id: '1', title: 'Product demo' },
    { id: '2', title: 'Renewal call' },
    { id: '3', title: null },
  ];

  it('should keep matching records in order', () => {
    expect(filterByTitle(records, 'demo, renewal').map((r) => r.id)).toEqual(['1', '2']);
  });

  it('should keep everything without a filter', () => {
    expect(filterByTitle(records).map((r) => r.id)).toEqual(['1', '2', '3']);
  });
});
