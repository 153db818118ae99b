/**
 * Vault file naming.
 *
 * Documents are named after their title; highlights after their timestamp
 * and source title. Every produced name (without extension) contains at
 * least one letter or digit: titles that sanitize to nothing fall back to
 * a name built from the item's metadata.
 */

import type { Highlight, ReaderDocument } from '../types.js';
import { parseTimestamp, toCompactStamp, toDateString, toFallbackStamp } from '../time.js';

export const NOTE_EXTENSION = '.md';

const MAX_TITLE_LENGTH = 100;
const MAX_AUTHOR_LENGTH = 30;

/**
 * UTF-8 budget for a title inside a file name. Names are limited to 255
 * bytes; the rest covers the extension, a " (NNNN)" counter, and for
 * highlights the stamp, brackets and " highlight" suffix.
 */
export const MAX_TITLE_BYTES = 200;

const ALNUM_RE = /[\p{L}\p{N}]/u;

/** True if the string contains at least one letter or digit. */
export function hasAlphanumeric(value: string): boolean {
  return ALNUM_RE.test(value);
}

/**
 * Cut to at most `maxLength` code points and `maxBytes` UTF-8 bytes,
 * never splitting a surrogate pair.
 */
export function truncateName(value: string, maxLength: number, maxBytes = MAX_TITLE_BYTES): string {
  let out = '';
  let bytes = 0;
  let count = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (count === maxLength || bytes + size > maxBytes) break;
    out += char;
    bytes += size;
    count++;
  }
  return out;
}

/**
 * Make a title safe to use as a file name stem.
 *
 * Examples:
 *   "Notes: Part 1/2"  → "Notes - Part 1-2"
 *   'Is "this" <ok>?'  → "Is this ok"
 */
export function sanitizeTitle(title: string, maxLength = MAX_TITLE_LENGTH): string {
  const cleaned = title
    .replace(/[\u0000-\u001f\u007f]+/g, ' ')  // Control characters and newlines
    .replace(/\//g, '-')
    .replace(/:/g, ' -')
    .replace(/[<>"\\|?*]/g, '');
  return truncateName(cleaned, maxLength).trim();
}

function categoryLabel(category: string | null): string {
  if (!category) return 'Document';
  if (category === 'tweet') return 'Tweet';
  return category.charAt(0).toUpperCase() + category.slice(1);
}

/** File name stem for a document whose title has no usable characters. */
export function fallbackDocumentStem(doc: ReaderDocument, now: Date): string {
  if (!doc.author && !doc.category && !doc.savedAt) {
    return `Untitled - ${toFallbackStamp(now)}`;
  }

  const author =
    sanitizeTitle((doc.author ?? '').replace(/[/:]/g, ''), MAX_AUTHOR_LENGTH) || 'Unknown';
  const saved = parseTimestamp(doc.savedAt);
  const date = saved ? toDateString(saved) : toDateString(now);
  return `${categoryLabel(doc.category)} by ${author} - ${date}`;
}

/** File name for a document: sanitized title, or a metadata fallback. */
export function documentFileName(doc: ReaderDocument, now: Date): string {
  const stem = sanitizeTitle(doc.title);
  return (hasAlphanumeric(stem) ? stem : fallbackDocumentStem(doc, now)) + NOTE_EXTENSION;
}

/** Sanitize a highlight's source title (the bracketed part of its file name). */
export function sanitizeSourceTitle(title: string | null): string {
  const sanitized = sanitizeTitle(title ?? '');
  return hasAlphanumeric(sanitized) ? sanitized : 'Untitled Source';
}

/** File name for a highlight: "YYYYMMDD-HHMMSS [Source] highlight.md". */
export function highlightFileName(highlight: Highlight, now: Date): string {
  const stamp = toCompactStamp(parseTimestamp(highlight.timestamp) ?? now);
  return `${stamp} [${sanitizeSourceTitle(highlight.sourceTitle)}] highlight${NOTE_EXTENSION}`;
}

/**
 * Add a numeric suffix to a file name: "Title.md" → "Title (2).md".
 * Counter 0 returns the name unchanged.
 */
export function withCounter(fileName: string, counter: number): string {
  if (counter === 0) return fileName;
  const stem = fileName.endsWith(NOTE_EXTENSION)
    ? fileName.slice(0, -NOTE_EXTENSION.length)
    : fileName;
  return `${stem} (${counter})${NOTE_EXTENSION}`;
}

/**
 * Extract an upstream ID from a Readwise URL (its last path segment).
 *
 *   "https://read.readwise.io/read/01abc/" → "01abc"
 */
export function extractIdFromUrl(url: string | null | undefined): string | null {
  if (!url) return null;
  const trimmed = url.trim().replace(/[?#].*$/, '').replace(/\/+$/, '');
  const segment = trimmed.split('/').pop();
  if (!segment || segment.includes(':')) return null;
  return segment;
}
