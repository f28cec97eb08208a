import { DateTime } from 'luxon';

const TIME_FORMATS = ['h:mm a', 'h:mma', 'h a', 'ha', 'H:mm', 'H'];

/**
 * Resolve a spoken clock time to the next future occurrence in `timezone`.
 * Falls back to UTC when the zone is unknown. Returns null if the time
 * cannot be read.
 */
export function resolveAlarmTime(
  time: string,
  timezone: string,
  now: DateTime = DateTime.now(),
): DateTime | null {
  const normalized = time.trim().replace(/\./g, '').replace(/\s+/g, ' ').toUpperCase();

  const clock = TIME_FORMATS.map((format) =>
    DateTime.fromFormat(normalized, format, { locale: 'en-US' }),
  ).find((parsed) => parsed.isValid);

  if (!clock) {
    return null;
  }

  let local = now.setZone(timezone);
  if (!local.isValid) {
    local = now.setZone('UTC');
  }

  let candidate = local.set({ hour: clock.hour, minute: clock.minute, second: 0, millisecond: 0 });
  if (candidate.toMillis() <= local.toMillis()) {
    candidate = candidate.plus({ days: 1 });
  }

  return candidate.setLocale('en-US');
}
