export class DateRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DateRangeError';
  }
}

export type DateParseResult =
  | { ok: true; date: string }
  | { ok: false; error: DateRangeError };

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/**
 * Build an ISO calendar date from numeric parts.
 * Throws DateRangeError when the parts do not name a real day.
 */
export function toISODate(year: number, month: number, day: number): string {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new DateRangeError(`year ${year} is out of range`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new DateRangeError('month must be in 1..12');
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    throw new DateRangeError('day is out of range for month');
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one.
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

/**
 * Parse a slash-separated US date (M/D/YYYY).
 *
 * The last segment is the year; the segments before it are month then day.
 */
export function parseSlashDate(dateStr: string): string {
  const parts = dateStr.split('/');
  const yearPart = parts[parts.length - 1];
  const monthPart = parts[0];
  const dayPart = parts[1];
  if (parts.length !== 3 || yearPart === undefined || monthPart === undefined || dayPart === undefined) {
    throw new DateRangeError(`Expected month/day/year, got: ${dateStr}`);
  }
  return toISODate(toInt(yearPart, dateStr), toInt(monthPart, dateStr), toInt(dayPart, dateStr));
}

export function tryParseSlashDate(dateStr: string): DateParseResult {
  try {
    return { ok: true, date: parseSlashDate(dateStr) };
  } catch (error) {
    if (error instanceof DateRangeError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function toInt(segment: string, dateStr: string): number {
  const trimmed = segment.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new DateRangeError(`Invalid date segment "${segment}" in: ${dateStr}`);
  }
  return parseInt(trimmed, 10);
}
