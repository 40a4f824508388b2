import { TimeParseError } from '../../errors.js';

const NUMERIC = /^\s*[+-]?\d+\s*$/;
// Latest instant a Date can hold.
const MAX_TIME = 8.64e15;

/**
 * Converts a cookie expiry to an absolute time.
 *
 * Positive integers (or purely numeric strings) are seconds since the Unix
 * epoch, anything else must be an HTTP date such as
 * `Tue, 02 Oct 2012 19:25:57 GMT`. Epochs past the last time a `Date` can
 * hold are clamped to it.
 *
 * @throws {TimeParseError} when neither reading applies
 */
export function expiresToTime(expires: string | number | Date): Date {
  if (expires instanceof Date) {
    if (Number.isNaN(expires.getTime())) throw new TimeParseError(String(expires));
    return new Date(expires.getTime());
  }

  if (typeof expires === 'number' || NUMERIC.test(expires)) {
    const seconds = typeof expires === 'number' ? Math.trunc(expires) : parseInt(expires, 10);
    // Bare numbers are never handed to the date parser.
    if (!Number.isFinite(seconds) || seconds <= 0) throw new TimeParseError(expires);
    // Far-future epochs ("never expires", e.g. INT64_MAX) clamp to MAX_TIME.
    return new Date(Math.min(seconds * 1000, MAX_TIME));
  }

  const time = Date.parse(expires.trim());
  if (Number.isNaN(time)) throw new TimeParseError(expires);
  return new Date(time);
}
