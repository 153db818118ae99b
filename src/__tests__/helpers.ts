import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { resolveVaultConfig, type VaultConfig } from '../config.js';
import type {
  ExportHighlightsParams,
  ListDocumentsParams,
  ListHighlightsParams,
  ReadwiseApi,
} from '../readwise/client.js';
import type { SyncContext } from '../sync/index.js';
import type { Highlight, Page, ReaderDocument } from '../types.js';

export const NOW = new Date('2026-02-01T00:00:00.000Z');

/**
 * Create a vault in a temp directory with the default layout.
 * Call cleanup() in afterEach().
 */
export function createTempVault(): { root: string; config: VaultConfig; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), 'readwise-vault-'));
  const config = resolveVaultConfig({ paginationDelayMs: 0 }, { vaultPath: root });
  return {
    root,
    config,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/** Noon UTC on the given day of January 2026. */
export function januaryNoon(day: number): string {
  return `2026-01-${String(day).padStart(2, '0')}T12:00:00.000Z`;
}

export function makeDocument(id: string, overrides: Partial<ReaderDocument> = {}): ReaderDocument {
  const savedAt = overrides.savedAt ?? januaryNoon(10);
  return {
    kind: 'document',
    id,
    title: `Document ${id}`,
    author: null,
    source: null,
    category: 'article',
    summary: null,
    content: null,
    notes: null,
    savedAt,
    updatedAt: savedAt,
    readwiseUrl: `https://read.readwise.io/read/${id}`,
    sourceUrl: null,
    tags: [],
    timestamp: savedAt,
    ...overrides,
  };
}

export function makeHighlight(id: string, overrides: Partial<Highlight> = {}): Highlight {
  const updatedAt = overrides.updatedAt ?? januaryNoon(10);
  return {
    kind: 'highlight',
    id,
    text: `Highlight ${id}`,
    note: null,
    location: null,
    highlightedAt: updatedAt,
    createdAt: updatedAt,
    updatedAt,
    readwiseUrl: `https://readwise.io/open/${id}`,
    bookId: '1',
    sourceTitle: 'Test Book',
    sourceAuthor: 'Test Author',
    sourceType: 'books',
    sourceUrl: null,
    tags: [],
    timestamp: updatedAt,
    ...overrides,
  };
}

/** Documents for days `from` down to `to` of January 2026, newest first. */
export function januaryDocuments(from: number, to: number): ReaderDocument[] {
  const docs: ReaderDocument[] = [];
  for (let day = from; day >= to; day--) {
    docs.push(makeDocument(`doc${day}`, { savedAt: januaryNoon(day), title: `January ${day}` }));
  }
  return docs;
}

/** Slice a list into cursor pages; the cursor is the next start index. */
export function pageOf<T>(items: T[], cursor: string | null | undefined, size: number): Page<T> {
  const start = cursor ? Number(cursor) : 0;
  const end = start + size;
  return {
    items: items.slice(start, end),
    nextCursor: end < items.length ? String(end) : null,
    rejected: 0,
  };
}

function isAfter(timestamp: string | null, after: string | null | undefined): boolean {
  if (!after) return true;
  if (!timestamp) return false;
  return Date.parse(timestamp) > Date.parse(after);
}

export type FakeCall =
  | { method: 'listDocuments'; params: ListDocumentsParams }
  | { method: 'exportHighlights'; params: ExportHighlightsParams }
  | { method: 'listHighlights'; params: ListHighlightsParams };

/**
 * In-process stand-in for the Readwise API. Items are served newest first
 * in the order given, filtered by updatedAfter and category like the real
 * endpoints.
 */
export class FakeReadwiseApi implements ReadwiseApi {
  documents: ReaderDocument[] = [];
  highlights: Highlight[] = [];
  /** Highlights per export page. */
  exportPageSize = 100;
  /** When set, every call rejects with this error. */
  failWith: Error | null = null;
  readonly calls: FakeCall[] = [];

  async listDocuments(params: ListDocumentsParams): Promise<Page<ReaderDocument>> {
    this.calls.push({ method: 'listDocuments', params });
    if (this.failWith) throw this.failWith;
    const matching = this.documents.filter(
      (d) => (!params.category || d.category === params.category) && isAfter(d.updatedAt, params.updatedAfter),
    );
    return pageOf(matching, params.pageCursor, params.limit ?? 100);
  }

  async exportHighlights(params: ExportHighlightsParams): Promise<Page<Highlight>> {
    this.calls.push({ method: 'exportHighlights', params });
    if (this.failWith) throw this.failWith;
    const bookIds = params.bookIds;
    const matching = this.highlights.filter(
      (h) =>
        (!bookIds || (h.bookId !== null && bookIds.includes(h.bookId))) &&
        isAfter(h.updatedAt, params.updatedAfter),
    );
    return pageOf(matching, params.pageCursor, this.exportPageSize);
  }

  async listHighlights(params: ListHighlightsParams): Promise<Page<Highlight>> {
    this.calls.push({ method: 'listHighlights', params });
    if (this.failWith) throw this.failWith;
    return pageOf(this.highlights, null, params.pageSize ?? 100);
  }
}

export function createContext(config: VaultConfig, api: ReadwiseApi): SyncContext {
  return {
    config,
    api,
    now: () => NOW,
    sleep: async () => {},
  };
}
