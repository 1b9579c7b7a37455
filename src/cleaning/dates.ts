/**
 * Date standardization for scraped publication dates
 */

import { format, isValid, parse } from 'date-fns';
import { normalizeText } from './text';

export interface DateFormat {
  name: string;
  // Gates the whole value and captures only its calendar-date part; weekday, time and zone are dropped
  pattern: RegExp;
  // date-fns pattern applied to the captured part
  dateFormat: string;
}

export const OUTPUT_DATE_FORMAT = 'yyyy-MM-dd';

// Ordered: the first format that yields a real calendar date wins
export const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: 'rfc2822',
    pattern: /^(?:[A-Za-z]{3},? )?(\d{1,2} [A-Za-z]{3,9} \d{4})(?: \d{1,2}:\d{2}(?::\d{2})?(?: ?(?:[+-]\d{4}|[A-Za-z]{1,5}))?)?$/,
    dateFormat: 'd MMMM yyyy'
  },
  { name: 'iso-date', pattern: /^(\d{4}-\d{2}-\d{2})$/, dateFormat: 'yyyy-MM-dd' },
  { name: 'us-date', pattern: /^(\d{1,2}\/\d{1,2}\/\d{4})$/, dateFormat: 'MM/dd/yyyy' },
  {
    name: 'iso-datetime',
    pattern: /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i,
    dateFormat: 'yyyy-MM-dd'
  },
  // Only reached when the US reading is impossible, e.g. 25/12/2024
  { name: 'eu-date', pattern: /^(\d{1,2}\/\d{1,2}\/\d{4})$/, dateFormat: 'dd/MM/yyyy' },
  { name: 'eu-dashed-date', pattern: /^(\d{1,2}-\d{1,2}-\d{4})$/, dateFormat: 'dd-MM-yyyy' },
  { name: 'us-dashed-date', pattern: /^(\d{1,2}-\d{1,2}-\d{4})$/, dateFormat: 'MM-dd-yyyy' },
  { name: 'slash-iso-date', pattern: /^(\d{4}\/\d{1,2}\/\d{1,2})$/, dateFormat: 'yyyy/MM/dd' },
  { name: 'day-month-name', pattern: /^(\d{1,2} [A-Za-z]+ \d{4})$/, dateFormat: 'd MMMM yyyy' },
  { name: 'month-name-day', pattern: /^([A-Za-z]+ \d{1,2}, \d{4})$/, dateFormat: 'MMMM d, yyyy' },
  { name: 'eu-short-year', pattern: /^(\d{1,2}\/\d{1,2}\/\d{2})$/, dateFormat: 'dd/MM/yy' },
  { name: 'us-short-year', pattern: /^(\d{1,2}\/\d{1,2}\/\d{2})$/, dateFormat: 'MM/dd/yy' },
  { name: 'compact-date', pattern: /^(\d{8})$/, dateFormat: 'yyyyMMdd' },
  // Last resort: a leading ISO date followed by anything
  { name: 'iso-date-prefix', pattern: /^(\d{4}-\d{2}-\d{2})/, dateFormat: 'yyyy-MM-dd' }
];

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

/**
 * Spell out abbreviated month names (`Sept`, `feb`) so one `MMMM` token reads them all
 */
export function expandMonthNames(text: string): string {
  return text.replace(/[A-Za-z]{3,}/g, word => {
    const lower = word.toLowerCase();
    return MONTH_NAMES.find(name => name.toLowerCase().startsWith(lower)) ?? word;
  });
}

// Fills in the time of day, and anchors two-digit years to 1950-2049
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a date string against DATE_FORMATS and return it as yyyy-MM-dd, or null if no format matches
 */
export function parseCalendarDate(value: string): string | null {
  const candidate = normalizeText(value);

  for (const { pattern, dateFormat } of DATE_FORMATS) {
    const match = pattern.exec(candidate);
    if (!match) continue;

    const parsed = parse(expandMonthNames(match[1]), dateFormat, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, OUTPUT_DATE_FORMAT);
    }
  }

  return null;
}

/**
 * Standardize a date value to yyyy-MM-dd.
 * Values no format understands are returned unchanged; rejecting them is left to validation.
 */
export function standardizeDate(value: string): string {
  return parseCalendarDate(value) ?? value;
}
