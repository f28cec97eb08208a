import { DateTime } from 'luxon';

/**
 * Convert a trigger time to a UTC instant.
 * ISO strings without an offset are read as UTC; strings with one are converted.
 * Returns null for anything unparseable.
 */
export function normalizeToUtc(input: Date | string): Date | null {
  const parsed =
    typeof input === 'string'
      ? DateTime.fromISO(input.trim(), { zone: 'utc' })
      : DateTime.fromJSDate(input, { zone: 'utc' });

  return parsed.isValid ? parsed.toJSDate() : null;
}
