/**
 * Sync driver: deduplicate upstream items against the vault and save the
 * new ones.
 *
 * The driver holds no state of its own. Callers pass in the section state
 * and the known-item sets, and get back the updated state together with a
 * result; persisting the state is the caller's job (except for the
 * checkpoints a backfill writes after every page).
 *
 * Items are processed in the order the API returns them. Per-item problems
 * are recorded as outcomes and never abort a batch.
 */

import type {
  BackfillResult,
  BatchTally,
  DateRange,
  ImportResult,
  ItemOutcome,
  Page,
  SyncState,
  VaultItem,
} from '../types.js';
import { laterTimestamp, parseTargetDate, parseTimestamp, toDateString } from '../time.js';
import { mergeRange, shouldSkipPagination } from '../state/ranges.js';
import { writeNewFile } from '../vault/write.js';
import type { ScanResult } from '../vault/scan.js';

/** Where and how one kind of item is written. */
export interface ImportTarget<T extends VaultItem> {
  directory: string;
  fileName(item: T, now: Date): string;
  render(item: T, now: Date): string;
}

/** IDs and file names already present in the vault (grows as items are saved). */
export interface KnownItems {
  ids: Set<string>;
  /** File name → upstream ID recorded in that file (null when none). */
  filenames: Map<string, string | null>;
}

export interface PageRequest {
  cursor: string | null;
  updatedAfter: string | null;
}

export type FetchPage<T> = (request: PageRequest) => Promise<Page<T>>;

/** Placeholder ID for results that never decoded into an item. */
export const UNDECODED_ID = '(undecoded)';

export function knownItemsFromScan(scan: ScanResult): KnownItems {
  return { ids: new Set(scan.knownIds), filenames: new Map(scan.knownFilenames) };
}

/**
 * Deduplicate and save a single item.
 *
 * 1. Known ID → skipped (always wins, whatever the file name).
 * 2. File name taken by a file without a recoverable ID → skipped.
 * 3. File name taken by a different ID → saved under a suffixed name.
 */
export function processItem<T extends VaultItem>(
  item: T,
  target: ImportTarget<T>,
  known: KnownItems,
  now: Date,
): ItemOutcome {
  if (known.ids.has(item.id)) {
    return { status: 'skipped', id: item.id, reason: 'known_id' };
  }

  try {
    const fileName = target.fileName(item, now);
    if (known.filenames.has(fileName) && known.filenames.get(fileName) === null) {
      return { status: 'skipped', id: item.id, reason: 'known_filename' };
    }

    const written = writeNewFile(
      target.directory,
      fileName,
      target.render(item, now),
      (name) => known.filenames.has(name),
    );
    known.ids.add(item.id);
    known.filenames.set(written, item.id);
    return { status: 'imported', id: item.id, file: written };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Failed to save ${item.kind} ${item.id}: ${reason}`);
    return { status: 'failed', id: item.id, reason };
  }
}

export function emptyTally(): BatchTally {
  return { imported: 0, skipped: 0, failed: 0, failures: [] };
}

/** Add one outcome to a running tally. */
export function addOutcome(tally: BatchTally, outcome: ItemOutcome): void {
  switch (outcome.status) {
    case 'imported':
      tally.imported++;
      break;
    case 'skipped':
      tally.skipped++;
      break;
    case 'failed':
      tally.failed++;
      tally.failures.push({ id: outcome.id, reason: outcome.reason });
      break;
  }
}

/** Count results that never decoded as failures. */
export function addRejected(tally: BatchTally, rejected: number): void {
  for (let i = 0; i < rejected; i++) {
    tally.failed++;
    tally.failures.push({ id: UNDECODED_ID, reason: 'Malformed item in API response' });
  }
}

/** Process a batch in the order given. */
export function processItems<T extends VaultItem>(
  items: T[],
  target: ImportTarget<T>,
  known: KnownItems,
  now: Date,
): { outcomes: ItemOutcome[]; tally: BatchTally } {
  const tally = emptyTally();
  const outcomes = items.map((item) => {
    const outcome = processItem(item, target, known, now);
    addOutcome(tally, outcome);
    return outcome;
  });
  return { outcomes, tally };
}

function updateTimestampOf(item: VaultItem): string | null {
  return item.updatedAt ?? item.timestamp;
}

/** Count of outcomes that failed while saving (as opposed to undecodable results). */
function writeFailures(tally: BatchTally): number {
  return tally.failures.filter((f) => f.id !== UNDECODED_ID).length;
}

// ---------------------------------------------------------------------------
// Recent import
// ---------------------------------------------------------------------------

/**
 * Fetch one page of items updated after the last import and save the new
 * ones. last_import_timestamp advances to the newest item's update time,
 * unless an item failed to save (it would otherwise be filtered out of the
 * next recent import).
 */
export async function importRecent<T extends VaultItem>(
  fetchPage: FetchPage<T>,
  target: ImportTarget<T>,
  known: KnownItems,
  state: SyncState,
  now: Date,
): Promise<{ state: SyncState; result: ImportResult }> {
  const page = await fetchPage({ cursor: null, updatedAfter: state.last_import_timestamp });
  const { tally } = processItems(page.items, target, known, now);
  addRejected(tally, page.rejected);

  let newest: string | null = null;
  for (const item of page.items) {
    newest = laterTimestamp(newest, updateTimestampOf(item));
  }

  let next = state;
  if (page.items.length > 0 && newest && writeFailures(tally) === 0) {
    next = { ...state, last_import_timestamp: laterTimestamp(state.last_import_timestamp, newest) };
  } else if (writeFailures(tally) > 0) {
    console.error(
      `${writeFailures(tally)} item(s) failed to save; last_import_timestamp left at ${state.last_import_timestamp ?? 'unset'}`,
    );
  }

  const result: ImportResult = {
    status: 'success',
    imported: tally.imported,
    skipped: tally.skipped,
    failed: tally.failed,
    total_analyzed: page.items.length + page.rejected,
    last_import_timestamp: next.last_import_timestamp,
  };
  if (tally.failures.length > 0) result.failures = tally.failures;

  return { state: next, result };
}

// ---------------------------------------------------------------------------
// Backfill
// ---------------------------------------------------------------------------

export interface BackfillOptions {
  /** YYYY-MM-DD (00:00 UTC) or a full timestamp. */
  targetDate: string;
  /** Safety limit on pages walked. */
  maxPages: number;
  /**
   * Whether the walked span may be recorded as a synced range. False when
   * the walk was narrowed (e.g. by category), since it then does not prove
   * every item in the span is present.
   */
  recordRange: boolean;
  now: () => Date;
  /** Called between page fetches (rate limiting). */
  throttle: () => Promise<void>;
  /** Persist intermediate state; called before the first page and after every page. */
  checkpoint: (state: SyncState) => void | Promise<void>;
}

interface WalkProgress {
  oldestSeen: Date | null;
  newestUpdate: string | null;
  tally: BatchTally;
}

/** The update time last_import_timestamp may move to; none while a save has failed. */
function advanceTo(progress: WalkProgress): string | null {
  return writeFailures(progress.tally) === 0 ? progress.newestUpdate : null;
}

function isEarlierDate(a: string, b: string | null): boolean {
  if (!b) return true;
  const da = parseTimestamp(a);
  const db = parseTimestamp(b);
  if (!da) return false;
  return !db || da.getTime() < db.getTime();
}

/**
 * Fold a walked span into the state at backfill entry. Always computed
 * from `base` so repeated checkpoints do not double count.
 */
function applyWalk(
  base: SyncState,
  span: DateRange | null,
  newestUpdate: string | null,
  inProgress: boolean,
): SyncState {
  let synced_ranges = base.synced_ranges;
  let oldest_imported_date = base.oldest_imported_date;

  if (span) {
    synced_ranges = mergeRange(synced_ranges, span);
    const spanStart = parseTimestamp(span.start);
    if (spanStart) {
      const date = toDateString(spanStart);
      if (isEarlierDate(date, oldest_imported_date)) oldest_imported_date = date;
    }
  }

  return {
    last_import_timestamp: laterTimestamp(base.last_import_timestamp, newestUpdate),
    oldest_imported_date,
    synced_ranges,
    backfill_in_progress: inProgress,
  };
}

/**
 * Walk the API backwards from the newest item until the target date is
 * passed, the cursor runs out, or the page limit is hit.
 *
 * A target already inside a synced range returns at once, without any
 * upstream call. Otherwise backfill_in_progress is set (and checkpointed)
 * before the first page and cleared only on clean completion, so an
 * interrupted run is visible to the next one.
 */
export async function backfill<T extends VaultItem>(
  fetchPage: FetchPage<T>,
  target: ImportTarget<T>,
  known: KnownItems,
  state: SyncState,
  options: BackfillOptions,
): Promise<{ state: SyncState; result: BackfillResult }> {
  const targetTime = parseTargetDate(options.targetDate);

  if (shouldSkipPagination(state.synced_ranges, options.targetDate)) {
    return {
      state,
      result: {
        status: 'already_synced',
        message: `Target date ${options.targetDate} already synced`,
        imported: 0,
        skipped: 0,
        failed: 0,
        pages: 0,
        reached_target: true,
      },
    };
  }

  const interrupted = state.backfill_in_progress;
  if (interrupted) {
    console.error('Previous backfill was interrupted; re-walking from the newest item');
  }

  const base = state;
  const startedAt = options.now();
  await options.checkpoint({ ...base, backfill_in_progress: true });

  const progress: WalkProgress = { oldestSeen: null, newestUpdate: null, tally: emptyTally() };

  const spanFrom = (start: Date): DateRange => ({
    start: start.toISOString(),
    end: startedAt.toISOString(),
    doc_count: progress.tally.imported + progress.tally.skipped,
    verified_at: options.now().toISOString(),
  });

  let cursor: string | null = null;
  let pages = 0;
  let reachedTarget = false;
  let exhausted = false;

  while (pages < options.maxPages) {
    if (pages > 0) await options.throttle();

    const page = await fetchPage({ cursor, updatedAfter: null });
    pages++;
    addRejected(progress.tally, page.rejected);

    if (page.items.length === 0) {
      exhausted = page.rejected === 0 || page.nextCursor === null;
      if (exhausted) break;
    }

    for (const item of page.items) {
      const ts = parseTimestamp(item.timestamp);
      if (ts && ts.getTime() < targetTime.getTime()) {
        reachedTarget = true;
        break;
      }
      if (ts && (!progress.oldestSeen || ts.getTime() < progress.oldestSeen.getTime())) {
        progress.oldestSeen = ts;
      }
      progress.newestUpdate = laterTimestamp(progress.newestUpdate, updateTimestampOf(item));
      addOutcome(progress.tally, processItem(item, target, known, options.now()));
    }

    if (reachedTarget) break;

    const checkpointSpan = options.recordRange && writeFailures(progress.tally) === 0 && progress.oldestSeen
      ? spanFrom(progress.oldestSeen)
      : null;
    await options.checkpoint(applyWalk(base, checkpointSpan, advanceTo(progress), true));

    cursor = page.nextCursor;
    if (!cursor) {
      exhausted = true;
      break;
    }
  }

  // Reaching the target or running out of items proves the span down to the target
  let spanStart: Date | null = null;
  if (reachedTarget || exhausted) {
    spanStart = targetTime;
  } else if (progress.oldestSeen) {
    spanStart = progress.oldestSeen;
  }

  const failures = writeFailures(progress.tally);
  let span: DateRange | null = null;
  if (spanStart && options.recordRange && failures === 0) {
    span = spanFrom(spanStart);
  } else if (failures > 0) {
    console.error(`${failures} item(s) failed to save; walked span not recorded as synced`);
  }

  const next = applyWalk(base, span, advanceTo(progress), false);

  let status: BackfillResult['status'];
  if (reachedTarget) {
    status = 'success';
  } else if (exhausted) {
    status = 'completed_all_pages';
  } else {
    status = 'page_limit_reached';
    console.error(`Backfill stopped at the ${options.maxPages}-page safety limit before reaching ${options.targetDate}`);
  }

  const result: BackfillResult = {
    status,
    imported: progress.tally.imported,
    skipped: progress.tally.skipped,
    failed: progress.tally.failed,
    pages,
    reached_target: reachedTarget,
  };
  if (status === 'page_limit_reached') {
    result.message =
      `Stopped at the ${options.maxPages}-page limit before reaching ${options.targetDate}. ` +
      'Every backfill starts from the newest item, so running it again stops at the same place. ' +
      'Raise maxBackfillPages (maxHighlightPages for highlights) in the config file to walk further back.';
  }
  if (interrupted) result.resumed_after_interruption = true;
  if (span) result.synced_range = span;
  if (progress.tally.failures.length > 0) result.failures = progress.tally.failures;

  return { state: next, result };
}
