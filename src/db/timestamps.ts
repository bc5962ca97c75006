/**
 * Canonical timestamp helpers for SQLite columns.
 *
 * SQLite's `datetime('now')` returns `YYYY-MM-DD HH:MM:SS` (UTC, space
 * separated, no timezone). Every timestamp column uses this format so that
 * string comparison in SQL orders chronologically. Milliseconds are dropped.
 */

const SQLITE_FORMAT = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/**
 * Formats a date as `YYYY-MM-DD HH:MM:SS` (UTC).
 */
export function sqliteTimestamp(date?: Date): string {
  return (date ?? new Date())
    .toISOString()
    .replace('T', ' ')
    .replace(/\.\d+Z$/, '');
}

/**
 * Parses a `YYYY-MM-DD HH:MM:SS` column value as a UTC instant.
 * @throws Error if the value is not in SQLite format
 */
export function parseSqliteTimestamp(value: string): Date {
  if (!isSqliteFormat(value)) {
    throw new Error(`Not a SQLite timestamp: ${value}`);
  }
  return new Date(`${value.replace(' ', 'T')}Z`);
}

export function isSqliteFormat(timestamp: string): boolean {
  return SQLITE_FORMAT.test(timestamp);
}
