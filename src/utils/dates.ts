/**
 * Parsing for the blog's `DD-Mon-YYYY` dates (e.g. `05-Jun-2024`)
 */

const MONTH_ABBREVIATIONS = [
  'jan',
  'feb',
  'mar',
  'apr',
  'may',
  'jun',
  'jul',
  'aug',
  'sep',
  'oct',
  'nov',
  'dec',
] as const;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

/** Matches a date token anywhere in a string */
export const DAY_MONTH_YEAR_PATTERN = /\d{2}-[A-Za-z]{3}-\d{4}/;

const EXACT_DAY_MONTH_YEAR = /^(\d{2})-([A-Za-z]{3})-(\d{4})$/;

/**
 * Parse a `DD-Mon-YYYY` token into a UTC midnight Date.
 *
 * Returns null for anything that is not a real calendar date, so a missing
 * value and a malformed one look the same to callers.
 */
export function parseAnnouncementDate(text: string | undefined): Date | null {
  if (!text) {
    return null;
  }

  const match = text.trim().match(EXACT_DAY_MONTH_YEAR);
  if (!match) {
    return null;
  }

  const [, dayText = '', monthText = '', yearText = ''] = match;
  const monthIndex = MONTH_ABBREVIATIONS.findIndex((abbr) => abbr === monthText.toLowerCase());
  if (monthIndex === -1) {
    return null;
  }

  const day = parseInt(dayText, 10);
  const year = parseInt(yearText, 10);
  // setUTCFullYear keeps years below 100 as written, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);

  // 31-Feb rolls over into March
  if (date.getUTCDate() !== day || date.getUTCMonth() !== monthIndex) {
    return null;
  }

  return date;
}

/**
 * Full English month name for a 1-based month number
 */
export function monthName(monthNumber: number): string {
  const name = MONTH_NAMES[monthNumber - 1];
  if (!name) {
    throw new RangeError(`Month number must be between 1 and 12, got ${monthNumber}`);
  }
  return name;
}
