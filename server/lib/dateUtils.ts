/**
 * Date-key helpers. A date key is a `YYYY-MM-DD` string; keys compare
 * correctly as strings. All functions are pure.
 */

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export const DEFAULT_TIME_ZONE = 'America/New_York';

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const match = String(dateKey || '')
    .trim()
    .match(DATE_KEY_PATTERN);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  // Rejects 2026-02-30 and friends, which Date.UTC silently rolls over.
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return NaN;
  return ms;
}

function isDateKey(value: unknown): value is string {
  return typeof value === 'string' && Number.isFinite(parseDateKeyToUtcMs(value));
}

function addDays(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) {
    throw new RangeError(`Invalid date key: ${dateKey}`);
  }
  const shifted = new Date(baseMs);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return dateKeyFromYmdParts(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

function isWeekday(dateKey: string): boolean {
  const ms = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(ms)) return false;
  const dow = new Date(ms).getUTCDay();
  return dow >= 1 && dow <= 5;
}

/** Calendar date of `instant` as seen in `timeZone`. */
function dateKeyInTimeZone(instant: Date | number, timeZone: string = DEFAULT_TIME_ZONE): string {
  const date = typeof instant === 'number' ? new Date(instant) : instant;
  return date.toLocaleDateString('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
}

function minDateKey(a: string | undefined, b: string | undefined): string | undefined {
  if (!a) return b;
  if (!b) return a;
  return a <= b ? a : b;
}

function maxDateKey(a: string | undefined, b: string | undefined): string | undefined {
  if (!a) return b;
  if (!b) return a;
  return a >= b ? a : b;
}

/** Every date key in `[start, endExclusive)`. */
function dateKeysBetween(start: string, endExclusive: string): string[] {
  const result: string[] = [];
  let cursor = start;
  for (let i = 0; i < 5000 && cursor < endExclusive; i++) {
    result.push(cursor);
    cursor = addDays(cursor, 1);
  }
  return result;
}

export { addDays, dateKeyInTimeZone, dateKeysBetween, isDateKey, isWeekday, maxDateKey, minDateKey };
