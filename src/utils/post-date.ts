/**
 * Post date helpers
 */

import { isValid, parse, parseISO } from "date-fns";

export const UNIX_EPOCH = new Date(0);

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ZONED_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}(:?\d{2})?)$/;

/**
 * Check a YYYY-MM-DD string names a real calendar day
 */
function isCalendarDate(text: string): boolean {
  return DATE_ONLY.test(text) && isValid(parse(text, "yyyy-MM-dd", UNIX_EPOCH));
}

/**
 * Derive an ISO-8601 timestamp at midnight UTC from the first ten
 * characters of a path
 *
 * @example
 * extractDateFromPath("2023-02-04-hello.html") // "2023-02-04T00:00:00+00:00"
 * extractDateFromPath("hello.html") // undefined
 */
export function extractDateFromPath(path: string): string | undefined {
  const prefix = path.slice(0, 10);
  if (!isCalendarDate(prefix)) return undefined;
  return `${prefix}T00:00:00+00:00`;
}

/**
 * Parse a post `date` field
 * Accepts YYYY-MM-DD (midnight UTC) or a date-time with an explicit zone.
 * Returns undefined for anything else.
 */
export function parsePostDate(text: string): Date | undefined {
  const dateOnly = DATE_ONLY.exec(text);
  if (dateOnly) {
    if (!isCalendarDate(text)) return undefined;
    const [, year, month, day] = dateOnly;
    return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  }

  if (!ZONED_DATE_TIME.test(text)) return undefined;
  const date = parseISO(text);
  return isValid(date) ? date : undefined;
}
