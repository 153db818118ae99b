import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  backfill,
  documentTarget,
  importRecent,
  knownItemsFromScan,
  processItem,
  scanSpecFor,
  type BackfillOptions,
  type FetchPage,
  type KnownItems,
} from '../sync/index.js';
import { emptySyncState } from '../state/store.js';
import { scanVault } from '../vault/scan.js';
import type { VaultConfig } from '../config.js';
import type { ReaderDocument, SyncState } from '../types.js';
import { NOW, createTempVault, januaryDocuments, januaryNoon, makeDocument, pageOf } from './helpers.js';

function emptyKnown(): KnownItems {
  return { ids: new Set(), filenames: new Map() };
}

/** Serve the given documents in cursor pages of `size`. */
function pagedFetch(docs: ReaderDocument[], size: number) {
  return vi.fn<FetchPage<ReaderDocument>>(async ({ cursor }) => pageOf(docs, cursor, size));
}

describe('sync driver', () => {
  let vault: ReturnType<typeof createTempVault>;
  let config: VaultConfig;

  beforeEach(() => {
    vault = createTempVault();
    config = vault.config;
  });

  afterEach(() => {
    vault.cleanup();
  });

  function knownFromVault(): KnownItems {
    return knownItemsFromScan(scanVault(scanSpecFor(config, 'documents'), NOW));
  }

  function files(): string[] {
    return existsSync(config.documentsDir) ? readdirSync(config.documentsDir).sort() : [];
  }

  describe('processItem', () => {
    it('should skip a known ID even when the title changed', () => {
      const target = documentTarget(config);
      processItem(makeDocument('a', { title: 'Old title' }), target, emptyKnown(), NOW);

      const outcome = processItem(makeDocument('a', { title: 'New title' }), target, knownFromVault(), NOW);

      expect(outcome).toEqual({ status: 'skipped', id: 'a', reason: 'known_id' });
      expect(files()).toEqual(['Old title.md']);
    });

    it('should skip when the file name belongs to a file without an ID', () => {
      const known: KnownItems = { ids: new Set(), filenames: new Map([['Manual.md', null]]) };

      const outcome = processItem(makeDocument('b', { title: 'Manual' }), documentTarget(config), known, NOW);

      expect(outcome).toEqual({ status: 'skipped', id: 'b', reason: 'known_filename' });
      expect(files()).toEqual([]);
    });

    it('should save under a suffixed name when another ID holds the file name', () => {
      const target = documentTarget(config);
      const known = emptyKnown();

      processItem(makeDocument('a', { title: 'Same' }), target, known, NOW);
      const outcome = processItem(makeDocument('b', { title: 'Same' }), target, known, NOW);

      expect(outcome).toEqual({ status: 'imported', id: 'b', file: 'Same (1).md' });
      expect(files()).toEqual(['Same (1).md', 'Same.md']);
      expect(known.ids).toEqual(new Set(['a', 'b']));
    });

    it('should save a long multi-byte title under a shortened name', () => {
      const outcome = processItem(makeDocument('a', { title: '\u6f22'.repeat(100) }), documentTarget(config), emptyKnown(), NOW);

      expect(outcome).toEqual({ status: 'imported', id: 'a', file: `${'\u6f22'.repeat(66)}.md` });
      expect(files()).toEqual([`${'\u6f22'.repeat(66)}.md`]);
    });

    it('should report a failed write as an outcome', () => {
      writeFileSync(join(config.vaultPath, 'not-a-dir'), '');
      const target = { ...documentTarget(config), directory: join(config.vaultPath, 'not-a-dir') };

      const outcome = processItem(makeDocument('a'), target, emptyKnown(), NOW);

      expect(outcome.status).toBe('failed');
      expect(outcome.id).toBe('a');
    });
  });

  describe('importRecent', () => {
    it('should import nothing when run again over the same items', async () => {
      const docs = januaryDocuments(12, 10);
      const fetchPage = pagedFetch(docs, 100);
      const target = documentTarget(config);

      const first = await importRecent(fetchPage, target, knownFromVault(), emptySyncState(), NOW);
      const second = await importRecent(fetchPage, target, knownFromVault(), first.state, NOW);

      expect(first.result).toMatchObject({ imported: 3, skipped: 0, failed: 0, total_analyzed: 3 });
      expect(second.result).toMatchObject({ imported: 0, skipped: 3, failed: 0 });
      expect(files()).toEqual(['January 10.md', 'January 11.md', 'January 12.md']);
    });

    it('should skip all ten items already in the vault', async () => {
      const docs = januaryDocuments(20, 11);
      const target = documentTarget(config);
      await importRecent(pagedFetch(docs, 100), target, emptyKnown(), emptySyncState(), NOW);

      const { result } = await importRecent(pagedFetch(docs, 100), target, knownFromVault(), emptySyncState(), NOW);

      expect(result).toMatchObject({ status: 'success', imported: 0, skipped: 10, failed: 0, total_analyzed: 10 });
    });

    it('should advance last_import_timestamp to the newest update', async () => {
      const docs = [
        makeDocument('a', { updatedAt: '2026-01-05T00:00:00Z' }),
        makeDocument('b', { updatedAt: '2026-01-07T00:00:00Z' }),
      ];
      const fetchPage = pagedFetch(docs, 100);
      const state: SyncState = { ...emptySyncState(), last_import_timestamp: '2026-01-01T00:00:00Z' };

      const { state: next, result } = await importRecent(fetchPage, documentTarget(config), emptyKnown(), state, NOW);

      expect(fetchPage).toHaveBeenCalledWith({ cursor: null, updatedAfter: '2026-01-01T00:00:00Z' });
      expect(next.last_import_timestamp).toBe('2026-01-07T00:00:00Z');
      expect(result.last_import_timestamp).toBe('2026-01-07T00:00:00Z');
    });

    it('should not advance the timestamp past a failed write', async () => {
      writeFileSync(join(config.vaultPath, 'not-a-dir'), '');
      const target = { ...documentTarget(config), directory: join(config.vaultPath, 'not-a-dir') };
      const state: SyncState = { ...emptySyncState(), last_import_timestamp: '2026-01-01T00:00:00Z' };

      const { state: next, result } = await importRecent(
        pagedFetch([makeDocument('a', { updatedAt: '2026-01-05T00:00:00Z' })], 100),
        target,
        emptyKnown(),
        state,
        NOW,
      );

      expect(next.last_import_timestamp).toBe('2026-01-01T00:00:00Z');
      expect(result.failed).toBe(1);
      expect(result.failures?.[0].id).toBe('a');
    });

    it('should count undecodable results as failed without holding back the timestamp', async () => {
      const fetchPage = vi.fn<FetchPage<ReaderDocument>>(async () => ({
        items: [makeDocument('a', { updatedAt: '2026-01-05T00:00:00Z' })],
        nextCursor: null,
        rejected: 2,
      }));

      const { state, result } = await importRecent(fetchPage, documentTarget(config), emptyKnown(), emptySyncState(), NOW);

      expect(result).toMatchObject({ imported: 1, failed: 2, total_analyzed: 3 });
      expect(state.last_import_timestamp).toBe('2026-01-05T00:00:00Z');
    });

    it('should leave the state alone when nothing changed', async () => {
      const state: SyncState = { ...emptySyncState(), last_import_timestamp: '2026-01-01T00:00:00Z' };
      const { state: next } = await importRecent(pagedFetch([], 100), documentTarget(config), emptyKnown(), state, NOW);
      expect(next).toBe(state);
    });
  });

  describe('backfill', () => {
    function options(overrides: Partial<BackfillOptions> = {}): BackfillOptions {
      return {
        targetDate: '2025-12-01',
        maxPages: 100,
        recordRange: true,
        now: () => NOW,
        throttle: async () => {},
        checkpoint: () => {},
        ...overrides,
      };
    }

    it('should return already_synced without fetching when the target is covered', async () => {
      const fetchPage = pagedFetch(januaryDocuments(25, 1), 10);
      const checkpoint = vi.fn();
      const state: SyncState = {
        ...emptySyncState(),
        synced_ranges: [
          { start: '2026-01-01T00:00:00Z', end: '2026-01-21T00:00:00Z', doc_count: 20, verified_at: '2026-01-21T00:00:00Z' },
        ],
      };

      const { state: next, result } = await backfill(
        fetchPage,
        documentTarget(config),
        emptyKnown(),
        state,
        options({ targetDate: '2026-01-15', checkpoint }),
      );

      expect(result).toEqual({
        status: 'already_synced',
        message: 'Target date 2026-01-15 already synced',
        imported: 0,
        skipped: 0,
        failed: 0,
        pages: 0,
        reached_target: true,
      });
      expect(fetchPage).not.toHaveBeenCalled();
      expect(checkpoint).not.toHaveBeenCalled();
      expect(next).toBe(state);
    });

    it('should walk every page when the target is older than all items', async () => {
      const fetchPage = pagedFetch(januaryDocuments(25, 1), 10);
      const throttle = vi.fn(async () => {});

      const { state, result } = await backfill(
        fetchPage,
        documentTarget(config),
        emptyKnown(),
        emptySyncState(),
        options({ throttle }),
      );

      expect(result.pages).toBeLessThanOrEqual(Math.ceil(25 / 10));
      expect(result).toMatchObject({
        status: 'completed_all_pages',
        imported: 25,
        pages: 3,
        reached_target: false,
      });
      expect(throttle).toHaveBeenCalledTimes(2);
      expect(result.synced_range).toEqual({
        start: '2025-12-01T00:00:00.000Z',
        end: '2026-02-01T00:00:00.000Z',
        doc_count: 25,
        verified_at: '2026-02-01T00:00:00.000Z',
      });
      expect(state.synced_ranges).toEqual([result.synced_range]);
      expect(state.oldest_imported_date).toBe('2025-12-01');
      expect(state.backfill_in_progress).toBe(false);
      expect(state.last_import_timestamp).toBe(januaryNoon(25));
    });

    it('should stop at the first item older than the target', async () => {
      const fetchPage = pagedFetch(januaryDocuments(25, 1), 10);

      const { state, result } = await backfill(
        fetchPage,
        documentTarget(config),
        emptyKnown(),
        emptySyncState(),
        options({ targetDate: '2026-01-15' }),
      );

      expect(result).toMatchObject({ status: 'success', imported: 11, pages: 2, reached_target: true });
      expect(result.synced_range?.start).toBe('2026-01-15T00:00:00.000Z');
      expect(state.oldest_imported_date).toBe('2026-01-15');
      expect(files()).toHaveLength(11);
      expect(files()).not.toContain('January 14.md');
    });

    it('should record only the walked span when the page limit is hit', async () => {
      const fetchPage = pagedFetch(januaryDocuments(25, 1), 10);

      const { state, result } = await backfill(
        fetchPage,
        documentTarget(config),
        emptyKnown(),
        emptySyncState(),
        options({ maxPages: 1 }),
      );

      expect(result).toMatchObject({ status: 'page_limit_reached', imported: 10, pages: 1, reached_target: false });
      expect(result.synced_range?.start).toBe(januaryNoon(16));
      expect(state.oldest_imported_date).toBe('2026-01-16');
      expect(state.backfill_in_progress).toBe(false);
    });

    it('should mark progress before the first page and after each page', async () => {
      const checkpoint = vi.fn<BackfillOptions['checkpoint']>();

      await backfill(
        pagedFetch(januaryDocuments(15, 1), 10),
        documentTarget(config),
        emptyKnown(),
        emptySyncState(),
        options({ checkpoint }),
      );

      expect(checkpoint).toHaveBeenCalledTimes(3);
      expect(checkpoint.mock.calls.map(([s]) => s.backfill_in_progress)).toEqual([true, true, true]);
      expect(checkpoint.mock.calls[0][0].synced_ranges).toEqual([]);
      expect(checkpoint.mock.calls[1][0].synced_ranges[0].start).toBe(januaryNoon(6));
    });

    it('should report a resumed run after an interruption', async () => {
      const state: SyncState = { ...emptySyncState(), backfill_in_progress: true };

      const { state: next, result } = await backfill(
        pagedFetch(januaryDocuments(3, 1), 10),
        documentTarget(config),
        emptyKnown(),
        state,
        options(),
      );

      expect(result.resumed_after_interruption).toBe(true);
      expect(next.backfill_in_progress).toBe(false);
    });

    it('should not record a range when items failed to save', async () => {
      writeFileSync(join(config.vaultPath, 'not-a-dir'), '');
      const target = { ...documentTarget(config), directory: join(config.vaultPath, 'not-a-dir') };

      const { state, result } = await backfill(
        pagedFetch(januaryDocuments(3, 1), 10),
        target,
        emptyKnown(),
        emptySyncState(),
        options(),
      );

      expect(result.failed).toBe(3);
      expect(result.synced_range).toBeUndefined();
      expect(state.synced_ranges).toEqual([]);
    });

    it('should keep last_import_timestamp when an item failed to save', async () => {
      writeFileSync(join(config.vaultPath, 'not-a-dir'), '');
      const target = { ...documentTarget(config), directory: join(config.vaultPath, 'not-a-dir') };
      const state: SyncState = { ...emptySyncState(), last_import_timestamp: '2026-01-01T12:00:00Z' };
      const checkpoint = vi.fn<BackfillOptions['checkpoint']>();

      const { state: next, result } = await backfill(
        pagedFetch([makeDocument('a', { savedAt: januaryNoon(20) })], 10),
        target,
        emptyKnown(),
        state,
        options({ checkpoint }),
      );

      expect(result.failed).toBe(1);
      expect(next.last_import_timestamp).toBe('2026-01-01T12:00:00Z');
      expect(checkpoint.mock.calls.map(([s]) => s.last_import_timestamp)).toEqual([
        '2026-01-01T12:00:00Z',
        '2026-01-01T12:00:00Z',
      ]);
    });

    it('should stop at the same place when a limited walk is repeated', async () => {
      const fetchPage = pagedFetch(januaryDocuments(25, 1), 10);

      const first = await backfill(
        fetchPage,
        documentTarget(config),
        emptyKnown(),
        emptySyncState(),
        options({ maxPages: 1 }),
      );
      const second = await backfill(
        fetchPage,
        documentTarget(config),
        knownFromVault(),
        first.state,
        options({ maxPages: 1 }),
      );

      expect(second.result).toMatchObject({ status: 'page_limit_reached', imported: 0, skipped: 10, pages: 1 });
      expect(second.result.synced_range?.start).toBe(januaryNoon(16));
      expect(second.state.oldest_imported_date).toBe('2026-01-16');
      expect(fetchPage.mock.calls.map(([request]) => request.cursor)).toEqual([null, null]);
      expect(second.result.message).toBe(
        'Stopped at the 1-page limit before reaching 2025-12-01. ' +
          'Every backfill starts from the newest item, so running it again stops at the same place. ' +
          'Raise maxBackfillPages (maxHighlightPages for highlights) in the config file to walk further back.',
      );
    });

    it('should not record a range for a narrowed walk', async () => {
      const { state, result } = await backfill(
        pagedFetch(januaryDocuments(3, 1), 10),
        documentTarget(config),
        emptyKnown(),
        emptySyncState(),
        options({ recordRange: false }),
      );

      expect(result.imported).toBe(3);
      expect(result.synced_range).toBeUndefined();
      expect(state.synced_ranges).toEqual([]);
    });

    it('should merge the new span into existing ranges', async () => {
      const state: SyncState = {
        ...emptySyncState(),
        synced_ranges: [
          { start: '2026-01-20T00:00:00Z', end: '2026-02-01T00:00:00Z', doc_count: 4, verified_at: '2026-01-25T00:00:00Z' },
        ],
      };

      const { state: next } = await backfill(
        pagedFetch(januaryDocuments(25, 1), 10),
        documentTarget(config),
        emptyKnown(),
        state,
        options({ targetDate: '2026-01-10' }),
      );

      expect(next.synced_ranges).toEqual([
        {
          start: '2026-01-10T00:00:00.000Z',
          end: '2026-02-01T00:00:00.000Z',
          doc_count: 20,
          verified_at: '2026-02-01T00:00:00.000Z',
        },
      ]);
    });

    it('should reject an invalid target date', async () => {
      await expect(
        backfill(pagedFetch([], 10), documentTarget(config), emptyKnown(), emptySyncState(), options({ targetDate: 'soon' })),
      ).rejects.toThrow('Invalid target date "soon": expected YYYY-MM-DD');
    });
  });
});
