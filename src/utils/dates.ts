/**
 * ISO date helpers shared by the ledger and pricing rules
 */

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME = /^(\d{4}-\d{2}-\d{2})T([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?$/;

/**
 * Check that a string is an ISO day or a local date-time on a real calendar
 * day. Dates are compared as strings, so zone designators are not accepted.
 */
export function isIsoDate(value: string): boolean {
  const day = ISO_DAY.test(value) ? value : ISO_DATETIME.exec(value)?.[1];
  if (day === undefined) return false;

  const parsed = new Date(`${day}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === day;
}

/**
 * Normalize an "as of" bound. A bare day covers the whole day, so
 * `2025-04-01` becomes `2025-04-01T23:59:59`.
 */
export function endOfDay(asOf: string): string {
  return ISO_DAY.test(asOf) ? `${asOf}T23:59:59` : asOf;
}

/** Day part (`YYYY-MM-DD`) of an ISO date or date-time */
export function toIsoDay(value: string): string {
  return value.slice(0, 10);
}

/** Add whole days to an ISO date, returning `YYYY-MM-DD` */
export function addDays(value: string, days: number): string {
  const base = new Date(`${toIsoDay(value)}T00:00:00Z`);
  base.setUTCDate(base.getUTCDate() + days);
  return base.toISOString().slice(0, 10);
}

/** True when `date` falls on or before the (normalized) `asOf` bound */
export function isOnOrBefore(date: string, asOf: string): boolean {
  return date <= endOfDay(asOf);
}
