/**
 * Host-facing operations.
 *
 * Each operation loads the state file, hands the relevant section to the
 * driver explicitly, writes the returned state back, and reports a
 * structured result. Exceptions stop here: they are logged and returned as
 * { status: 'error', message } so the host never sees a throw.
 */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { VaultConfig } from '../config.js';
import type { ReadwiseApi } from '../readwise/client.js';
import type {
  BackfillResult,
  DateRange,
  ErrorResult,
  Highlight,
  ImportResult,
  ReaderDocument,
  StateSection,
  SyncState,
  SyncStateFile,
} from '../types.js';
import { getSection, loadState, withSection, writeState, emptySyncState } from '../state/store.js';
import { parseTimestamp, toDateString } from '../time.js';
import { documentFileName, highlightFileName } from '../vault/filenames.js';
import { dailyReviewToMarkdown, documentToMarkdown, highlightToMarkdown } from '../vault/render.js';
import { documentIdOf, highlightIdOf, scanVault, type ScanSpec } from '../vault/scan.js';
import { backfill, importRecent, knownItemsFromScan, type ImportTarget } from './driver.js';

/** Everything an operation needs, passed explicitly (no module-level state). */
export interface SyncContext {
  config: VaultConfig;
  api: ReadwiseApi;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
}

export type OperationResult<T> = T | ErrorResult;

/** Run an operation, turning any exception into an error result. */
export async function runOperation<T>(label: string, fn: () => Promise<T> | T): Promise<OperationResult<T>> {
  try {
    return await fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error ${label}: ${message}`);
    return { status: 'error', message };
  }
}

// ---------------------------------------------------------------------------
// Targets and scan specs
// ---------------------------------------------------------------------------

export function documentTarget(config: VaultConfig): ImportTarget<ReaderDocument> {
  return {
    directory: config.documentsDir,
    fileName: documentFileName,
    render: (doc) => documentToMarkdown(doc),
  };
}

export function highlightTarget(config: VaultConfig): ImportTarget<Highlight> {
  return {
    directory: config.highlightsDir,
    fileName: highlightFileName,
    render: highlightToMarkdown,
  };
}

export function scanSpecFor(config: VaultConfig, section: StateSection): ScanSpec {
  if (section === 'highlights') {
    return {
      directories: [config.highlightsDir],
      idOf: highlightIdOf,
      timestampFields: ['updated_at', 'highlighted_at'],
    };
  }
  return {
    directories: [config.documentsDir, config.archivesDir],
    idOf: documentIdOf,
    timestampFields: ['saved_at'],
  };
}

/** Persist one section of the state file, keeping the other as loaded. */
function saveSection(ctx: SyncContext, file: SyncStateFile, section: StateSection, state: SyncState): SyncStateFile {
  const next = withSection(file, section, state);
  writeState(ctx.config.stateFile, next);
  return next;
}

// ---------------------------------------------------------------------------
// Recent import
// ---------------------------------------------------------------------------

export interface RecentDocumentsParams {
  category?: string;
  limit?: number;
}

/** Import documents updated since the last import. */
export function importRecentDocuments(
  ctx: SyncContext,
  params: RecentDocumentsParams = {},
): Promise<OperationResult<ImportResult>> {
  return runOperation('importing recent documents', async () => {
    const now = ctx.now();
    const file = loadState(ctx.config.stateFile);
    const known = knownItemsFromScan(scanVault(scanSpecFor(ctx.config, 'documents'), now));

    const { state, result } = await importRecent(
      ({ updatedAfter }) =>
        ctx.api.listDocuments({ category: params.category, updatedAfter, limit: params.limit ?? 20 }),
      documentTarget(ctx.config),
      known,
      getSection(file, 'documents'),
      now,
    );

    saveSection(ctx, file, 'documents', state);
    return result;
  });
}

export interface RecentHighlightsParams {
  limit?: number;
}

/** Import highlights (across all sources) updated since the last import. */
export function importRecentHighlights(
  ctx: SyncContext,
  params: RecentHighlightsParams = {},
): Promise<OperationResult<ImportResult>> {
  return runOperation('importing recent highlights', async () => {
    const now = ctx.now();
    const file = loadState(ctx.config.stateFile);
    const known = knownItemsFromScan(scanVault(scanSpecFor(ctx.config, 'highlights'), now));

    const { state, result } = await importRecent(
      ({ updatedAfter }) =>
        ctx.api.exportHighlights({ updatedAfter, pageSize: Math.min(params.limit ?? 100, 1000) }),
      highlightTarget(ctx.config),
      known,
      getSection(file, 'highlights'),
      now,
    );

    saveSection(ctx, file, 'highlights', state);
    return result;
  });
}

// ---------------------------------------------------------------------------
// Backfill
// ---------------------------------------------------------------------------

export interface BackfillDocumentsParams {
  targetDate: string;
  category?: string;
}

/** Walk documents back to a target date, skipping spans already synced. */
export function backfillDocuments(
  ctx: SyncContext,
  params: BackfillDocumentsParams,
): Promise<OperationResult<BackfillResult>> {
  return runOperation('in backfill', async () => {
    let file = loadState(ctx.config.stateFile);
    const known = knownItemsFromScan(scanVault(scanSpecFor(ctx.config, 'documents'), ctx.now()));

    const { state, result } = await backfill(
      ({ cursor }) =>
        ctx.api.listDocuments({
          category: params.category,
          pageCursor: cursor,
          limit: ctx.config.pageSize,
        }),
      documentTarget(ctx.config),
      known,
      getSection(file, 'documents'),
      {
        targetDate: params.targetDate,
        maxPages: ctx.config.maxBackfillPages,
        recordRange: !params.category,
        now: ctx.now,
        throttle: () => ctx.sleep(ctx.config.paginationDelayMs),
        checkpoint: (s) => {
          file = saveSection(ctx, file, 'documents', s);
        },
      },
    );

    if (result.status !== 'already_synced') {
      saveSection(ctx, file, 'documents', state);
    }
    return result;
  });
}

export interface BackfillHighlightsParams {
  targetDate: string;
}

/** Walk highlights back to a target date, skipping spans already synced. */
export function backfillHighlights(
  ctx: SyncContext,
  params: BackfillHighlightsParams,
): Promise<OperationResult<BackfillResult>> {
  return runOperation('in highlights backfill', async () => {
    let file = loadState(ctx.config.stateFile);
    const known = knownItemsFromScan(scanVault(scanSpecFor(ctx.config, 'highlights'), ctx.now()));

    const { state, result } = await backfill(
      ({ cursor }) => ctx.api.exportHighlights({ pageCursor: cursor }),
      highlightTarget(ctx.config),
      known,
      getSection(file, 'highlights'),
      {
        targetDate: params.targetDate,
        maxPages: ctx.config.maxHighlightPages,
        recordRange: true,
        now: ctx.now,
        throttle: () => ctx.sleep(ctx.config.paginationDelayMs),
        checkpoint: (s) => {
          file = saveSection(ctx, file, 'highlights', s);
        },
      },
    );

    if (result.status !== 'already_synced') {
      saveSection(ctx, file, 'highlights', state);
    }
    return result;
  });
}

// ---------------------------------------------------------------------------
// State maintenance
// ---------------------------------------------------------------------------

export interface SectionInfo {
  last_import: string | null;
  oldest_imported: string | null;
  synced_ranges: DateRange[];
  backfill_in_progress: boolean;
  files_on_disk: number;
  files_with_ids: number;
}

export interface StateInfoResult {
  status: 'success';
  state_file: string;
  documents?: SectionInfo;
  highlights?: SectionInfo;
}

/** Current state plus what the vault actually holds. */
export function getStateInfo(
  ctx: SyncContext,
  section?: StateSection,
): Promise<OperationResult<StateInfoResult>> {
  return runOperation('getting state info', () => {
    const file = loadState(ctx.config.stateFile);
    const result: StateInfoResult = { status: 'success', state_file: ctx.config.stateFile };

    const sections: StateSection[] = section ? [section] : ['documents', 'highlights'];
    for (const name of sections) {
      const state = getSection(file, name);
      const scan = scanVault(scanSpecFor(ctx.config, name), ctx.now());
      result[name] = {
        last_import: state.last_import_timestamp,
        oldest_imported: state.oldest_imported_date,
        synced_ranges: state.synced_ranges,
        backfill_in_progress: state.backfill_in_progress,
        files_on_disk: scan.knownFilenames.size,
        files_with_ids: scan.knownIds.size,
      };
    }
    return result;
  });
}

export type RebuildRangesResult =
  | { status: 'success'; section: StateSection; range: DateRange; documents_analyzed: number }
  | { status: 'no_documents'; section: StateSection; message: string };

/**
 * Replace a section's synced ranges with the single range inferred from
 * the files in the vault.
 */
export function rebuildRanges(
  ctx: SyncContext,
  section: StateSection = 'documents',
): Promise<OperationResult<RebuildRangesResult>> {
  return runOperation('initializing ranges', (): RebuildRangesResult => {
    const scan = scanVault(scanSpecFor(ctx.config, section), ctx.now());
    if (!scan.range) {
      return { status: 'no_documents', section, message: 'No documents with dates found' };
    }

    const start = parseTimestamp(scan.range.start);
    const file = loadState(ctx.config.stateFile);
    const state: SyncState = {
      ...getSection(file, section),
      synced_ranges: [scan.range],
      oldest_imported_date: start ? toDateString(start) : null,
    };
    saveSection(ctx, file, section, state);

    return { status: 'success', section, range: scan.range, documents_analyzed: scan.range.doc_count };
  });
}

export type ResetScope = StateSection | 'all';

export interface ResetStateResult {
  status: 'success';
  message: string;
  section: ResetScope;
  cleared_ranges: boolean;
}

function resetSection(state: SyncState, clearRanges: boolean): SyncState {
  if (clearRanges) return emptySyncState();
  return {
    last_import_timestamp: null,
    oldest_imported_date: state.oldest_imported_date,
    synced_ranges: state.synced_ranges,
    backfill_in_progress: false,
  };
}

/** Clear import progress, optionally keeping synced ranges. */
export function resetState(
  ctx: SyncContext,
  params: { section?: ResetScope; clearRanges?: boolean } = {},
): Promise<OperationResult<ResetStateResult>> {
  return runOperation('resetting state', (): ResetStateResult => {
    const scope = params.section ?? 'all';
    const clearRanges = params.clearRanges ?? false;

    let file = loadState(ctx.config.stateFile);
    const sections: StateSection[] = scope === 'all' ? ['documents', 'highlights'] : [scope];
    for (const name of sections) {
      file = withSection(file, name, resetSection(getSection(file, name), clearRanges));
    }
    writeState(ctx.config.stateFile, file);

    return { status: 'success', message: 'State reset', section: scope, cleared_ranges: clearRanges };
  });
}

// ---------------------------------------------------------------------------
// Highlight lookups
// ---------------------------------------------------------------------------

export type DailyReviewResult =
  | { status: 'success'; count: number; file: string }
  | { status: 'no_highlights'; count: 0 };

/** Write today's review note (latest highlights) to the daily reviews directory. */
export function dailyReview(ctx: SyncContext): Promise<OperationResult<DailyReviewResult>> {
  return runOperation('in daily review', async (): Promise<DailyReviewResult> => {
    const page = await ctx.api.listHighlights({ pageSize: 50 });
    if (page.items.length === 0) {
      return { status: 'no_highlights', count: 0 };
    }

    const today = toDateString(ctx.now());
    if (!existsSync(ctx.config.dailyReviewsDir)) {
      mkdirSync(ctx.config.dailyReviewsDir, { recursive: true });
    }
    const filePath = join(ctx.config.dailyReviewsDir, `${today}.md`);
    writeFileSync(filePath, dailyReviewToMarkdown(page.items, today), 'utf-8');

    return { status: 'success', count: page.items.length, file: filePath };
  });
}

export interface HighlightSummary {
  id: string;
  text: string;
  note: string | null;
  book_title: string | null;
  location: number | string | null;
  source: string | null;
  highlighted_at: string | null;
}

function summarize(highlight: Highlight): HighlightSummary {
  return {
    id: highlight.id,
    text: highlight.text,
    note: highlight.note,
    book_title: highlight.sourceTitle,
    location: highlight.location,
    source: highlight.sourceUrl ?? highlight.readwiseUrl,
    highlighted_at: highlight.highlightedAt ?? highlight.createdAt,
  };
}

export interface HighlightListResult {
  status: 'success';
  count: number;
  highlights: HighlightSummary[];
}

/** Highlights for one book, by ID or by (case-insensitive) title substring. */
export function bookHighlights(
  ctx: SyncContext,
  params: { title?: string; bookId?: string } = {},
): Promise<OperationResult<HighlightListResult>> {
  return runOperation('fetching book highlights', async (): Promise<HighlightListResult> => {
    const page = await ctx.api.exportHighlights({ bookIds: params.bookId ? [params.bookId] : undefined });
    let highlights = page.items;
    if (params.title) {
      const title = params.title.toLowerCase();
      highlights = highlights.filter((h) => (h.sourceTitle ?? '').toLowerCase().includes(title));
    }

    return {
      status: 'success',
      count: highlights.length,
      highlights: highlights.slice(0, 50).map(summarize),
    };
  });
}

/** Case-insensitive text search over the latest highlights (text and note). */
export function searchHighlights(
  ctx: SyncContext,
  params: { query: string; limit?: number },
): Promise<OperationResult<HighlightListResult>> {
  return runOperation('searching highlights', async (): Promise<HighlightListResult> => {
    const page = await ctx.api.listHighlights({ pageSize: 100 });
    const query = params.query.toLowerCase();
    const matching = page.items.filter(
      (h) => h.text.toLowerCase().includes(query) || (h.note ?? '').toLowerCase().includes(query),
    );

    return {
      status: 'success',
      count: matching.length,
      highlights: matching.slice(0, params.limit ?? 50).map(summarize),
    };
  });
}
