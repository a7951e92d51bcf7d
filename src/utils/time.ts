/**
 * Timestamp helpers for the scheduler and watermark.
 *
 * All scheduling arithmetic happens on Date values in UTC. Strings only
 * appear at the edges (CLI arguments, logs, persisted rows).
 */

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse an ISO-8601 timestamp. A timestamp without an offset is read as UTC,
 * so "2024-03-10T23:45:00" and "2024-03-10T23:45:00Z" are the same instant.
 */
export function parseTimestamp(value: string): Date {
  const trimmed = value.trim();
  const normalized = DATE_ONLY.test(trimmed)
    ? `${trimmed}T00:00:00Z`
    : HAS_ZONE.test(trimmed)
      ? trimmed
      : `${trimmed}Z`;

  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    throw new RangeError(`Invalid timestamp: '${value}'`);
  }
  return parsed;
}

/**
 * Validate a calendar date in YYYY-MM-DD form and return it unchanged.
 */
export function parseDateOnly(value: string): string {
  const match = DATE_ONLY.exec(value.trim());
  if (!match) {
    throw new RangeError(`Invalid date (expected YYYY-MM-DD): '${value}'`);
  }
  const [, year, month, day] = match;
  const date = new Date(`${String(year)}-${String(month)}-${String(day)}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || toDateString(date) !== value.trim()) {
    throw new RangeError(`Invalid date (expected YYYY-MM-DD): '${value}'`);
  }
  return value.trim();
}

/**
 * UTC date portion of a timestamp, as YYYY-MM-DD.
 */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

/**
 * True when `now` has reached `due`. Compares instants, never strings.
 */
export function isDue(now: Date, due: Date): boolean {
  return now.getTime() >= due.getTime();
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${String(Math.round(ms))}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds % 60);
  return `${String(minutes)}m ${String(rest)}s`;
}
