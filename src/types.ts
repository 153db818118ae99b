// === State Sections ===

export const STATE_SECTIONS = ['documents', 'highlights'] as const;

export type StateSection = (typeof STATE_SECTIONS)[number];

// === Persisted State ===

/** A span of time whose items are confirmed to be present in the vault. */
export interface DateRange {
  start: string;
  end: string;
  doc_count: number;
  verified_at: string;
}

export interface SyncState {
  last_import_timestamp: string | null;
  /** YYYY-MM-DD */
  oldest_imported_date: string | null;
  synced_ranges: DateRange[];
  backfill_in_progress: boolean;
}

/**
 * Shape of the state file. The documents section sits at the top level
 * (the file predates highlight support); highlights are nested.
 */
export interface SyncStateFile extends SyncState {
  highlights: SyncState;
}

// === Upstream Items ===

export interface ReaderDocument {
  kind: 'document';
  id: string;
  title: string;
  author: string | null;
  source: string | null;
  category: string | null;
  summary: string | null;
  content: string | null;
  notes: string | null;
  savedAt: string | null;
  updatedAt: string | null;
  readwiseUrl: string;
  sourceUrl: string | null;
  tags: string[];
  /** Ordering key used for backfill (saved_at). */
  timestamp: string | null;
}

export interface Highlight {
  kind: 'highlight';
  id: string;
  text: string;
  note: string | null;
  location: number | string | null;
  highlightedAt: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  readwiseUrl: string | null;
  bookId: string | null;
  sourceTitle: string | null;
  sourceAuthor: string | null;
  sourceType: string | null;
  sourceUrl: string | null;
  tags: string[];
  /** Ordering key used for backfill (updated, then highlighted_at, then created_at). */
  timestamp: string | null;
}

export type VaultItem = ReaderDocument | Highlight;

/** One page of decoded items from a paginated endpoint. */
export interface Page<T> {
  items: T[];
  nextCursor: string | null;
  /** Results that did not decode into a known item shape. */
  rejected: number;
}

// === Outcomes ===

export const SKIP_REASONS = ['known_id', 'known_filename'] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export type ItemOutcome =
  | { status: 'imported'; id: string; file: string }
  | { status: 'skipped'; id: string; reason: SkipReason }
  | { status: 'failed'; id: string; reason: string };

export interface ItemFailure {
  id: string;
  reason: string;
}

export interface BatchTally {
  imported: number;
  skipped: number;
  failed: number;
  failures: ItemFailure[];
}

export interface ErrorResult {
  status: 'error';
  message: string;
}

export interface ImportResult {
  status: 'success';
  imported: number;
  skipped: number;
  failed: number;
  total_analyzed: number;
  last_import_timestamp: string | null;
  failures?: ItemFailure[];
}

export const BACKFILL_STATUSES = [
  'already_synced',
  'success',
  'completed_all_pages',
  'page_limit_reached',
] as const;

export type BackfillStatus = (typeof BACKFILL_STATUSES)[number];

export interface BackfillResult {
  status: BackfillStatus;
  imported: number;
  skipped: number;
  failed: number;
  pages: number;
  reached_target: boolean;
  message?: string;
  resumed_after_interruption?: boolean;
  synced_range?: DateRange;
  failures?: ItemFailure[];
}
