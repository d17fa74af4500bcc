/**
 * Date range utilities
 */

export {
  InvalidDateRangeError,
  isValidCalendarDate,
  parseDateRange,
  startYear,
  toQueryWindow,
} from './date-range.js';
export type { DateRange, QueryWindow } from './date-range.js';
