/**
 * Synced-range bookkeeping.
 *
 * A synced range is a span of time whose items have been confirmed present
 * in the vault, either by walking the upstream API or by scanning the
 * vault. Pagination is the expensive, rate-limited operation; once a span
 * has been walked it never needs to be walked again, so ranges act as a
 * cache of known-good intervals (not of item content).
 */

import type { DateRange } from '../types.js';
import { parseTargetDate, parseTimestamp } from '../time.js';

interface ParsedRange {
  range: DateRange;
  start: number;
  end: number;
  verifiedAt: number;
}

function parseRange(range: DateRange): ParsedRange | null {
  const start = parseTimestamp(range.start);
  const end = parseTimestamp(range.end);
  if (!start || !end || start.getTime() > end.getTime()) return null;
  const verified = parseTimestamp(range.verified_at);
  return {
    range,
    start: start.getTime(),
    end: end.getTime(),
    verifiedAt: verified ? verified.getTime() : Number.NEGATIVE_INFINITY,
  };
}

/**
 * Find the range containing the target date, if any.
 * The target is a YYYY-MM-DD date (00:00 UTC) or a full timestamp.
 */
export function findCoveringRange(ranges: DateRange[], targetDate: string): DateRange | null {
  const target = parseTargetDate(targetDate).getTime();
  for (const range of ranges) {
    const parsed = parseRange(range);
    if (parsed && parsed.start <= target && target <= parsed.end) {
      return range;
    }
  }
  return null;
}

/**
 * True iff the target date falls within [start, end] of an existing range,
 * in which case a backfill to that date needs no upstream pagination.
 */
export function shouldSkipPagination(ranges: DateRange[], targetDate: string): boolean {
  const covering = findCoveringRange(ranges, targetDate);
  if (covering) {
    console.error(
      `Target date ${targetDate} already synced (range: ${covering.start} to ${covering.end})`,
    );
    return true;
  }

  const target = parseTargetDate(targetDate).getTime();
  const sorted = ranges
    .map(parseRange)
    .filter((r): r is ParsedRange => r !== null)
    .sort((a, b) => a.start - b.start);
  const next = sorted.find((r) => target < r.start);
  if (next) {
    console.error(`Gap detected: target ${targetDate} is before synced range ${next.range.start}`);
  }
  return false;
}

/**
 * Insert a range and coalesce everything that overlaps or abuts.
 *
 * Coalesced ranges take the union span, the summed doc_count and the latest
 * verified_at. The result is sorted by start and pairwise non-overlapping.
 * Unparseable ranges are dropped.
 */
export function mergeRange(ranges: DateRange[], newRange: DateRange): DateRange[] {
  const parsed = [...ranges, newRange]
    .map(parseRange)
    .filter((r): r is ParsedRange => r !== null)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const merged: ParsedRange[] = [];
  for (const current of parsed) {
    const last = merged[merged.length - 1];
    if (last && current.start <= last.end) {
      const end = current.end > last.end ? current : last;
      const verified = current.verifiedAt > last.verifiedAt ? current : last;
      merged[merged.length - 1] = {
        range: {
          start: last.range.start,
          end: end.range.end,
          doc_count: last.range.doc_count + current.range.doc_count,
          verified_at: verified.range.verified_at,
        },
        start: last.start,
        end: end.end,
        verifiedAt: verified.verifiedAt,
      };
    } else {
      merged.push({ ...current, range: { ...current.range } });
    }
  }

  return merged.map((r) => r.range);
}
