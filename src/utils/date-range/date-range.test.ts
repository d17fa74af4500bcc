/**
 * Unit tests for date range utilities
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidDateRangeError,
  isValidCalendarDate,
  parseDateRange,
  startYear,
  toQueryWindow,
} from './date-range.js';

describe('isValidCalendarDate', () => {
  it('should accept real calendar dates', () => {
    expect(isValidCalendarDate('2024-01-01')).toBe(true);
    expect(isValidCalendarDate('2024-02-29')).toBe(true);
    expect(isValidCalendarDate('2022-12-31')).toBe(true);
  });

  it('should reject impossible dates', () => {
    expect(isValidCalendarDate('2023-02-29')).toBe(false);
    expect(isValidCalendarDate('2024-13-01')).toBe(false);
    expect(isValidCalendarDate('2024-04-31')).toBe(false);
    expect(isValidCalendarDate('2024-00-10')).toBe(false);
  });

  it('should reject other formats', () => {
    expect(isValidCalendarDate('2024/01/01')).toBe(false);
    expect(isValidCalendarDate('2024-1-1')).toBe(false);
    expect(isValidCalendarDate('2024-01-01T00:00:00Z')).toBe(false);
    expect(isValidCalendarDate('')).toBe(false);
  });
});

describe('parseDateRange', () => {
  it('should return a trimmed range', () => {
    expect(parseDateRange(' 2022-01-01', '2024-12-31 ')).toEqual({
      startDate: '2022-01-01',
      endDate: '2024-12-31',
    });
  });

  it('should accept a single-day range', () => {
    expect(parseDateRange('2024-03-15', '2024-03-15')).toEqual({
      startDate: '2024-03-15',
      endDate: '2024-03-15',
    });
  });

  it('should reject a start after the end', () => {
    expect(() => parseDateRange('2024-02-01', '2024-01-31')).toThrow(
      'Start date 2024-02-01 is after end date 2024-01-31'
    );
  });

  it('should reject malformed dates', () => {
    expect(() => parseDateRange('01/01/2024', '2024-01-31')).toThrow(InvalidDateRangeError);
    expect(() => parseDateRange('2024-01-01', '2024-02-30')).toThrow(
      "Invalid end date '2024-02-30', expected YYYY-MM-DD"
    );
  });
});

describe('toQueryWindow', () => {
  it('should end at the start of the day after the end date', () => {
    expect(toQueryWindow({ startDate: '2024-01-01', endDate: '2024-01-01' })).toEqual({
      fromDateTime: '2024-01-01T00:00:00Z',
      toDateTime: '2024-01-02T00:00:00Z',
    });
  });

  it('should cross month and year boundaries', () => {
    expect(toQueryWindow({ startDate: '2024-01-15', endDate: '2024-01-31' }).toDateTime).toBe(
      '2024-02-01T00:00:00Z'
    );
    expect(toQueryWindow({ startDate: '2022-01-01', endDate: '2024-12-31' })).toEqual({
      fromDateTime: '2022-01-01T00:00:00Z',
      toDateTime: '2025-01-01T00:00:00Z',
    });
  });

  it('should handle leap days', () => {
    expect(toQueryWindow({ startDate: '2024-02-01', endDate: '2024-02-28' }).toDateTime).toBe(
      '2024-02-29T00:00:00Z'
    );
    expect(toQueryWindow({ startDate: '2023-02-01', endDate: '2023-02-28' }).toDateTime).toBe(
      '2023-03-01T00:00:00Z'
    );
  });
});

describe('startYear', () => {
  it('should return the year of the start date', () => {
    expect(startYear({ startDate: '2022-06-01', endDate: '2024-12-31' })).toBe(2022);
  });
});
