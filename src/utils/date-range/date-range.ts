/**
 * Date range utilities
 *
 * A download covers an inclusive range of calendar dates. The API filters
 * calls by instant, so the range is turned into a half-open UTC window:
 * start of the first day up to (excluding) start of the day after the last.
 */

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Inclusive range of calendar dates (YYYY-MM-DD)
 */
export interface DateRange {
  startDate: string;
  endDate: string;
}

/**
 * Half-open UTC window sent to the API
 */
export interface QueryWindow {
  /** ISO-8601 instant, inclusive */
  fromDateTime: string;
  /** ISO-8601 instant, exclusive */
  toDateTime: string;
}

/**
 * Error thrown for a malformed date or a range whose start is after its end
 */
export class InvalidDateRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDateRangeError';
  }
}

/**
 * Check that a value is a real calendar date in YYYY-MM-DD form
 *
 * @example
 * isValidCalendarDate('2024-02-29') // true
 * isValidCalendarDate('2023-02-29') // false
 */
export function isValidCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Validate and build a date range
 *
 * @throws InvalidDateRangeError if either date is invalid or start > end
 */
export function parseDateRange(startDate: string, endDate: string): DateRange {
  const start = startDate.trim();
  const end = endDate.trim();

  if (!isValidCalendarDate(start)) {
    throw new InvalidDateRangeError(
      `Invalid start date '${startDate}', expected YYYY-MM-DD`
    );
  }
  if (!isValidCalendarDate(end)) {
    throw new InvalidDateRangeError(
      `Invalid end date '${endDate}', expected YYYY-MM-DD`
    );
  }
  // Lexical order equals chronological order for YYYY-MM-DD
  if (start > end) {
    throw new InvalidDateRangeError(
      `Start date ${start} is after end date ${end}`
    );
  }

  return { startDate: start, endDate: end };
}

function startOfDayUtc(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

function formatInstant(date: Date): string {
  return `${date.toISOString().slice(0, 10)}T00:00:00Z`;
}

/**
 * Convert an inclusive date range into the API's half-open window
 *
 * @example
 * toQueryWindow({ startDate: '2024-01-01', endDate: '2024-01-01' })
 * // { fromDateTime: '2024-01-01T00:00:00Z', toDateTime: '2024-01-02T00:00:00Z' }
 */
export function toQueryWindow(range: DateRange): QueryWindow {
  const dayAfterEnd = startOfDayUtc(range.endDate);
  dayAfterEnd.setUTCDate(dayAfterEnd.getUTCDate() + 1);

  return {
    fromDateTime: formatInstant(startOfDayUtc(range.startDate)),
    toDateTime: formatInstant(dayAfterEnd),
  };
}

/**
 * Calendar year of the range start
 */
export function startYear(range: DateRange): number {
  return Number(range.startDate.slice(0, 4));
}
