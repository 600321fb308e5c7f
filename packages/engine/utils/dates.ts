// Calendar-day helpers. All days are UTC and formatted YYYY-MM-DD.

const DAY_MS = 86_400_000;
const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function toDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Parse a day string or timestamp into a UTC day; null when unparseable */
export function normalizeDay(value: unknown): string | null {
  if (value instanceof Date) return dayOf(value);
  if (typeof value === 'number') return Number.isFinite(value) ? dayOf(new Date(value)) : null;
  if (typeof value !== 'string' || value.trim() === '') return null;

  const trimmed = value.trim();
  if (ISO_DAY.test(trimmed)) {
    // Date rolls 2026-02-30 over to March; only round-tripping days are real
    return dayOf(new Date(`${trimmed}T00:00:00Z`)) === trimmed ? trimmed : null;
  }
  return dayOf(new Date(trimmed));
}

/** Day of a valid four-digit-year date; null for invalid or out-of-range dates */
function dayOf(date: Date): string | null {
  const time = date.getTime();
  if (Number.isNaN(time)) return null;
  const year = date.getUTCFullYear();
  return year < 0 || year > 9999 ? null : toDay(date);
}

export function dayToTime(day: string): number {
  return Date.parse(`${day}T00:00:00Z`);
}

export function addDays(day: string, days: number): string {
  return toDay(new Date(dayToTime(day) + days * DAY_MS));
}

/** Whole days from `from` to `to` (positive when `to` is later) */
export function diffDays(from: string, to: string): number {
  return Math.round((dayToTime(to) - dayToTime(from)) / DAY_MS);
}
