/**
 * Timestamp helpers.
 *
 * Upstream timestamps are not always valid ISO 8601: values such as
 * "2025-03-01T10:00:00+00:00Z" (offset plus a trailing Z) have been seen
 * in the wild. Everything that parses an upstream or on-disk timestamp
 * goes through parseTimestamp().
 */

const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Strip duplicated zone designators from an ISO timestamp.
 *
 * Examples:
 *   "2025-03-01T10:00:00+00:00Z"      → "2025-03-01T10:00:00+00:00"
 *   "2025-03-01T10:00:00ZZ"           → "2025-03-01T10:00:00Z"
 *   "2025-03-01T10:00:00+00:00+00:00" → "2025-03-01T10:00:00+00:00"
 */
export function normalizeTimestamp(raw: string): string {
  let value = raw.trim();
  // Offset followed by Z
  value = value.replace(/([+-]\d{2}:?\d{2})Z+$/i, '$1');
  // Repeated Z
  value = value.replace(/Z{2,}$/i, 'Z');
  // Repeated offsets
  value = value.replace(/([+-]\d{2}:?\d{2})(?:[+-]\d{2}:?\d{2})+$/, '$1');
  return value;
}

/**
 * Parse a timestamp from upstream data or YAML frontmatter.
 * Accepts Date objects (YAML parsers produce them) and strings.
 * Returns null for anything that does not parse.
 */
export function parseTimestamp(raw: unknown): Date | null {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? null : raw;
  }
  if (typeof raw !== 'string' || raw.trim().length === 0) return null;

  const value = normalizeTimestamp(raw);
  // Date-only strings are taken at 00:00 UTC
  const ms = DATE_ONLY_RE.test(value) ? Date.parse(`${value}T00:00:00Z`) : Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Parse a backfill target: "YYYY-MM-DD" (00:00 UTC) or an ISO timestamp
 * with an explicit zone. Throws on anything else, including impossible
 * calendar dates.
 */
export function parseTargetDate(target: string): Date {
  const value = normalizeTimestamp(target);
  const dateOnly = DATE_ONLY_RE.test(value);
  const parsed = dateOnly || ISO_TIMESTAMP_RE.test(value) ? parseTimestamp(value) : null;
  if (!parsed || (dateOnly && toDateString(parsed) !== value)) {
    throw new Error(`Invalid target date "${target}": expected YYYY-MM-DD`);
  }
  return parsed;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** YYYY-MM-DD (UTC). */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** YYYYMMDD-HHMMSS (UTC), used as a filename prefix. */
export function toCompactStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** YYYY-MM-DD-HHMMSS (UTC), used for untitled fallbacks. */
export function toFallbackStamp(date: Date): string {
  return (
    `${toDateString(date)}-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** The later of two optional ISO timestamps (unparseable values lose). */
export function laterTimestamp(a: string | null, b: string | null): string | null {
  const da = parseTimestamp(a);
  const db = parseTimestamp(b);
  if (!da) return db ? b : a;
  if (!db) return a;
  return db.getTime() > da.getTime() ? b : a;
}
