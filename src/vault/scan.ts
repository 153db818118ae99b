/**
 * Vault scanner.
 *
 * Rebuilds dedup state from the Markdown files already in the vault:
 * which upstream IDs are present, which file names are taken (and by which
 * ID), and the time span the files cover. Used for dedup lookups before
 * every import and to rebuild synced ranges when state is missing or reset.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import matter from 'gray-matter';
import type { DateRange } from '../types.js';
import { parseTimestamp } from '../time.js';
import { NOTE_EXTENSION, extractIdFromUrl } from './filenames.js';

/** What to scan and how to read IDs and timestamps from frontmatter. */
export interface ScanSpec {
  directories: string[];
  /** Recover the upstream ID from a file's frontmatter (null when absent). */
  idOf(data: Record<string, unknown>): string | null;
  /** Frontmatter fields holding the item timestamp, in order of preference. */
  timestampFields: readonly string[];
}

export interface ScanResult {
  knownIds: Set<string>;
  /** File name → upstream ID recorded in that file (null when none). */
  knownFilenames: Map<string, string | null>;
  /** Single range covering every scanned file with a timestamp. */
  range: DateRange | null;
  filesScanned: number;
}

function scalarToString(value: unknown): string | null {
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/** Documents are identified by the last segment of their readwise_url. */
export function documentIdOf(data: Record<string, unknown>): string | null {
  const url = scalarToString(data.readwise_url);
  return extractIdFromUrl(url);
}

/** Highlights carry highlight_id; older files may only have readwise_url. */
export function highlightIdOf(data: Record<string, unknown>): string | null {
  return scalarToString(data.highlight_id) ?? extractIdFromUrl(scalarToString(data.readwise_url));
}

/**
 * Scan the configured directories for *.md files. Missing directories are
 * skipped; unreadable files or malformed frontmatter are logged and left
 * out of the ID set (their file names still count as taken).
 */
export function scanVault(spec: ScanSpec, now: Date): ScanResult {
  const knownIds = new Set<string>();
  const knownFilenames = new Map<string, string | null>();
  let min: Date | null = null;
  let max: Date | null = null;
  let dated = 0;
  let filesScanned = 0;

  for (const directory of spec.directories) {
    if (!existsSync(directory)) continue;

    const files = readdirSync(directory).filter((f) => f.endsWith(NOTE_EXTENSION));
    for (const file of files) {
      filesScanned++;
      if (!knownFilenames.has(file)) knownFilenames.set(file, null);

      let data: Record<string, unknown>;
      try {
        const raw = readFileSync(join(directory, file), 'utf-8');
        data = matter(raw).data;
      } catch (error) {
        console.error(
          `Skipping unreadable vault file ${join(directory, file)}: ${error instanceof Error ? error.message : String(error)}`,
        );
        continue;
      }

      const id = spec.idOf(data);
      if (id) {
        knownIds.add(id);
        knownFilenames.set(file, id);
      }

      for (const field of spec.timestampFields) {
        const ts = parseTimestamp(data[field]);
        if (!ts) continue;
        dated++;
        if (!min || ts.getTime() < min.getTime()) min = ts;
        if (!max || ts.getTime() > max.getTime()) max = ts;
        break;
      }
    }
  }

  const range: DateRange | null =
    min && max
      ? {
          start: min.toISOString(),
          end: max.toISOString(),
          doc_count: dated,
          verified_at: now.toISOString(),
        }
      : null;

  return { knownIds, knownFilenames, range, filesScanned };
}
