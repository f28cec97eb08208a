import { addDays, format, isValid, parse, startOfDay } from 'date-fns';

const RELATIVE_DAYS: Readonly<Record<string, number>> = {
  today: 0,
  tomorrow: 1,
  'day after tomorrow': 2,
};

const DATE_FORMATS = ['yyyy-MM-dd', 'do MMM yyyy', 'do MMMM yyyy', 'd MMM yyyy', 'd MMMM yyyy'];

/**
 * Resolve a spoken travel date to yyyy-MM-dd.
 * Returns null when the text is not a date we understand.
 */
export function parseTravelDate(value: string, now: Date = new Date()): string | null {
  const text = value.trim().toLowerCase().replace(/\s+/g, ' ');

  const offset = RELATIVE_DAYS[text];
  if (offset !== undefined) {
    return format(addDays(startOfDay(now), offset), 'yyyy-MM-dd');
  }

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(text, pattern, now);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }

  return null;
}

/** Departure-hour ranges, end exclusive */
const WINDOW_HOURS: Readonly<Record<string, readonly [number, number]>> = {
  morning: [6, 12],
  afternoon: [12, 16],
  evening: [16, 22],
  night: [22, 6],
};

/**
 * Whether an HH:mm departure falls in a day-part.
 * Unknown windows match everything; night wraps past midnight.
 */
export function departsInWindow(departureTime: string, window: string): boolean {
  const range = WINDOW_HOURS[window.toLowerCase()];
  if (!range) {
    return true;
  }

  const hour = Number.parseInt(departureTime.split(':')[0] ?? '', 10);
  if (Number.isNaN(hour)) {
    return false;
  }

  const [start, end] = range;
  return start < end ? hour >= start && hour < end : hour >= start || hour < end;
}
