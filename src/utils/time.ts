export const HOUR_MS = 60 * 60 * 1000;

const TIMEZONE_SUFFIX = /([zZ]|[+\-]\d{2}(?::?\d{2})?)$/;

// Date.parse only takes the extended "+HH:MM" offset form.
const normalizeOffset = (value: string): string =>
  value.replace(/([+\-])(\d{2})(\d{2})?$/, (_match, sign: string, hours: string, minutes: string | undefined) => `${sign}${hours}:${minutes ?? '00'}`);

export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = TIMEZONE_SUFFIX.test(trimmed) && /[T ]\d{2}:\d{2}/.test(trimmed);
  const parsed = Date.parse(withTimezone ? normalizeOffset(trimmed) : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * True when the written local clock time sits on a whole hour. A bare date
 * counts as midnight.
 */
export const isOnWholeHour = (value: string): boolean => {
  const match = value.trim().match(/[T ]\d{2}:(\d{2})(?::(\d{2})(?:[.,](\d+))?)?/);
  if (!match) return true;
  const [, minutes, seconds = '00', fraction = '0'] = match;
  return minutes === '00' && seconds === '00' && /^0+$/.test(fraction);
};

/**
 * Accepts the timestamp shapes tabular rows tend to carry: ISO strings,
 * epoch milliseconds and Date objects.
 */
export const timeValueToMs = (value: unknown): number | null => {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms : null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    return parseIsoTimeToMs(value);
  }
  return null;
};

/**
 * Floors `timeMs` to the start of its hour on the grid anchored at `anchorMs`.
 * With a UTC anchor this is a plain floor to the hour; series recorded in a
 * half-hour offset zone keep their own hour boundaries.
 */
export const floorToHourGrid = (timeMs: number, anchorMs: number = 0): number => {
  const offset = ((anchorMs % HOUR_MS) + HOUR_MS) % HOUR_MS;
  return Math.floor((timeMs - offset) / HOUR_MS) * HOUR_MS + offset;
};

export const hoursBetween = (startMs: number, endMs: number): number => (endMs - startMs) / HOUR_MS;

export const isIsoDate = (value: string): boolean => /^\d{4}-\d{2}-\d{2}$/.test(value) && Number.isFinite(Date.parse(`${value}T00:00:00Z`));
