/**
 * Response header parsing.
 * @module protocol/headers
 */

import { HeaderParseError } from '../errors.js';
import { getHeader } from '../transport/index.js';

/**
 * `<weekday>, <day> <month> <year> <hour>:<minute>:<second> GMT`
 */
const LAST_MODIFIED_PATTERN =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{1,2}) ([A-Za-z]{3}) (\d{4}) (\d{1,2}):(\d{1,2}):(\d{1,2}) GMT$/i;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Reads `content-length`; an absent header counts as 0.
 */
export function parseContentLength(headers: Record<string, string>): number {
  const value = getHeader(headers, 'content-length');
  if (value === undefined) {
    return 0;
  }

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new HeaderParseError('content-length', value, 'InvalidContentLength');
  }
  return parseInt(trimmed, 10);
}

/**
 * Parses an HTTP date in the fixed GMT format as a UTC instant.
 */
export function parseHttpDate(value: string): Date {
  const match = LAST_MODIFIED_PATTERN.exec(value.trim());
  const month = match ? MONTHS.indexOf(match[3].toLowerCase()) : -1;
  if (!match || month === -1) {
    throw new HeaderParseError('last-modified', value, 'InvalidLastModified');
  }

  const [day, year, hours, minutes, seconds] = [2, 4, 5, 6, 7].map((index) =>
    parseInt(match[index], 10)
  );
  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));

  // Date.UTC rolls overflowing fields into the next unit; reject instead.
  if (
    date.getUTCDate() !== day ||
    date.getUTCMonth() !== month ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new HeaderParseError('last-modified', value, 'InvalidLastModified');
  }
  return date;
}

/**
 * Reads `last-modified`; an absent header yields `undefined`.
 */
export function parseLastModified(headers: Record<string, string>): Date | undefined {
  const value = getHeader(headers, 'last-modified');
  return value === undefined ? undefined : parseHttpDate(value);
}
