/**
 * State file persistence.
 *
 * The state file must stay readable by other tooling, so field names and
 * the nested range list are kept exactly as written by earlier versions.
 * Records written before a field existed load with that field defaulted;
 * nothing in the file is fatal. The file is replaced atomically (temp file
 * + rename) so an interrupted write never leaves a truncated record.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomBytes } from 'node:crypto';
import type { DateRange, StateSection, SyncState, SyncStateFile } from '../types.js';
import { parseTimestamp } from '../time.js';

/** An empty section: nothing imported, no ranges. */
export function emptySyncState(): SyncState {
  return {
    last_import_timestamp: null,
    oldest_imported_date: null,
    synced_ranges: [],
    backfill_in_progress: false,
  };
}

export function emptyStateFile(): SyncStateFile {
  return { ...emptySyncState(), highlights: emptySyncState() };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one synced range. Returns null for entries that cannot be used
 * (missing or unparseable endpoints, start after end).
 */
export function parseDateRange(data: unknown): DateRange | null {
  if (!isRecord(data)) return null;
  if (typeof data.start !== 'string' || typeof data.end !== 'string') return null;

  const start = parseTimestamp(data.start);
  const end = parseTimestamp(data.end);
  if (!start || !end || start.getTime() > end.getTime()) return null;

  // doc_count must be a non-negative integer (default 0)
  const doc_count =
    typeof data.doc_count === 'number' && Number.isInteger(data.doc_count) && data.doc_count >= 0
      ? data.doc_count
      : 0;

  // verified_at defaults to the end of the range
  const verified_at = typeof data.verified_at === 'string' && parseTimestamp(data.verified_at)
    ? data.verified_at
    : data.end;

  return { start: data.start, end: data.end, doc_count, verified_at };
}

/** Parse one state section, defaulting every missing or invalid field. */
export function parseSyncState(data: unknown): SyncState {
  if (!isRecord(data)) return emptySyncState();

  const last_import_timestamp =
    typeof data.last_import_timestamp === 'string' && data.last_import_timestamp.length > 0
      ? data.last_import_timestamp
      : null;

  const oldest_imported_date =
    typeof data.oldest_imported_date === 'string' && data.oldest_imported_date.length > 0
      ? data.oldest_imported_date
      : null;

  const synced_ranges: DateRange[] = [];
  if (Array.isArray(data.synced_ranges)) {
    for (const entry of data.synced_ranges) {
      const range = parseDateRange(entry);
      if (range) {
        synced_ranges.push(range);
      } else {
        console.error(`Ignoring invalid synced range: ${JSON.stringify(entry)}`);
      }
    }
  }

  const backfill_in_progress = data.backfill_in_progress === true;

  return { last_import_timestamp, oldest_imported_date, synced_ranges, backfill_in_progress };
}

/** Parse the whole state file. Older files without a highlights section are accepted. */
export function parseStateFile(data: unknown): SyncStateFile {
  const documents = parseSyncState(data);
  const highlights = isRecord(data) ? parseSyncState(data.highlights) : emptySyncState();
  return { ...documents, highlights };
}

/**
 * Load the state file. Never throws: a missing or unparseable file yields
 * the empty state.
 */
export function loadState(path: string): SyncStateFile {
  if (!existsSync(path)) return emptyStateFile();

  try {
    const raw = readFileSync(path, 'utf-8');
    return parseStateFile(JSON.parse(raw));
  } catch (error) {
    console.error(
      `Warning: could not read state file ${path}, starting from empty state: ${error instanceof Error ? error.message : String(error)}`,
    );
    return emptyStateFile();
  }
}

function sectionToJSON(state: SyncState): Record<string, unknown> {
  const json: Record<string, unknown> = {
    last_import_timestamp: state.last_import_timestamp,
  };
  // Only include oldest_imported_date when known (keep the file clean)
  if (state.oldest_imported_date) {
    json.oldest_imported_date = state.oldest_imported_date;
  }
  json.synced_ranges = state.synced_ranges.map((r) => ({
    start: r.start,
    end: r.end,
    doc_count: r.doc_count,
    verified_at: r.verified_at,
  }));
  json.backfill_in_progress = state.backfill_in_progress;
  return json;
}

/**
 * Replace the state file atomically. Filesystem errors propagate to the
 * caller; they are not retried.
 */
export function writeState(path: string, state: SyncStateFile): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const json = { ...sectionToJSON(state), highlights: sectionToJSON(state.highlights) };
  const tmpFile = `${path}.tmp.${randomBytes(4).toString('hex')}`;
  writeFileSync(tmpFile, JSON.stringify(json, null, 2) + '\n', 'utf-8');
  renameSync(tmpFile, path);
}

/** Read one section out of the file record. */
export function getSection(file: SyncStateFile, section: StateSection): SyncState {
  if (section === 'highlights') return file.highlights;
  return {
    last_import_timestamp: file.last_import_timestamp,
    oldest_imported_date: file.oldest_imported_date,
    synced_ranges: file.synced_ranges,
    backfill_in_progress: file.backfill_in_progress,
  };
}

/** Return a new file record with one section replaced. */
export function withSection(file: SyncStateFile, section: StateSection, state: SyncState): SyncStateFile {
  if (section === 'highlights') return { ...file, highlights: state };
  return { ...state, highlights: file.highlights };
}
