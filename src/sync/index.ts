/**
 * Sync layer: incremental import of Readwise items into the vault.
 *
 * The driver deduplicates and writes items; operations wire it to the
 * state file, the vault scanner and the Readwise API.
 */

export {
  processItem,
  processItems,
  importRecent,
  backfill,
  knownItemsFromScan,
  emptyTally,
  UNDECODED_ID,
} from './driver.js';
export type { ImportTarget, KnownItems, PageRequest, FetchPage, BackfillOptions } from './driver.js';
export {
  runOperation,
  documentTarget,
  highlightTarget,
  scanSpecFor,
  importRecentDocuments,
  importRecentHighlights,
  backfillDocuments,
  backfillHighlights,
  getStateInfo,
  rebuildRanges,
  resetState,
  dailyReview,
  bookHighlights,
  searchHighlights,
} from './operations.js';
export type {
  SyncContext,
  OperationResult,
  StateInfoResult,
  SectionInfo,
  RebuildRangesResult,
  ResetScope,
  ResetStateResult,
  DailyReviewResult,
  HighlightListResult,
  HighlightSummary,
} from './operations.js';
