/**
 * dateNormalizer.ts — Parse and format the portal's calendar dates.
 *
 * The portal prints dates as "dd/MM/yyyy" (two-digit day and month,
 * four-digit year) with no time or zone.  They are read as UTC midnight so
 * that comparisons never shift a day with the host's timezone, and written
 * back in the same format for the caller.
 *
 * Luxon's `fromFormat` accepts "1/2/1998" for "dd/MM/yyyy" and silently
 * rejects impossible dates ("31/02/2010"); the shape is checked with a regex
 * first and the calendar validity is left to Luxon.
 */

import { DateTime } from 'luxon';

const PORTAL_FORMAT = 'dd/MM/yyyy';
const PORTAL_SHAPE = /^\d{2}\/\d{2}\/\d{4}$/;

/**
 * Parse "15/05/2015" into a Date at 2015-05-15T00:00:00.000Z.
 *
 * @returns `null` for anything that is not a real calendar date in the
 *   portal's format.  Callers keep the surrounding record and treat the
 *   date as absent.
 */
export function parsePortalDate(raw: string): Date | null {
  const trimmed = raw.trim();
  if (!PORTAL_SHAPE.test(trimmed)) return null;

  const parsed = DateTime.fromFormat(trimmed, PORTAL_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed.toJSDate() : null;
}

/** Format a Date as "dd/MM/yyyy", reading its UTC calendar day. */
export function formatPortalDate(date: Date): string {
  return DateTime.fromJSDate(date, { zone: 'utc' }).toFormat(PORTAL_FORMAT);
}

/** UTC midnight of the given calendar day (month is 1-based). */
export function utcDate(year: number, month: number, day: number): Date {
  return DateTime.utc(year, month, day).toJSDate();
}
