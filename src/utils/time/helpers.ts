/**
 * Calendar date helpers
 *
 * Report ranges are whole calendar days written as `YYYY-MM-DD`. All
 * arithmetic happens in UTC so a day is always 24 hours long.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD` calendar date
 * @param text - Candidate date text
 * @returns UTC midnight of that day, or null when the text is not a real date
 */
export function parseCalendarDate(text: string): Date | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Reject rollovers such as 2024-02-30
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Format the UTC calendar day of a moment as `YYYY-MM-DD`
 * @param date - Any moment within the day
 */
export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Shift a UTC date by whole days
 * @param date - Start date
 * @param days - Number of days, may be negative
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 86400000);
}

/**
 * Storage timestamp of the first second of a calendar day
 * @param date - UTC midnight of the day
 */
export function startOfDayTimestamp(date: Date): string {
  return formatCalendarDate(date) + ' 00:00:00';
}
