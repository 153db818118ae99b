/**
 * Decode Readwise API responses into tagged item records.
 *
 * Responses are untrusted JSON. Each result is validated on its own: a
 * result that does not match the expected shape is counted as rejected
 * rather than failing the page. Optional fields default to null.
 */

import { z } from 'zod';
import type { Highlight, Page, ReaderDocument } from '../types.js';
import { extractIdFromUrl } from '../vault/filenames.js';

const READER_URL_BASE = 'https://read.readwise.io/read';

const optionalString = z.string().nullish().transform((v) => v ?? null);

/** Tags arrive as a list of names, a list of {name} objects, or a name-keyed map (Reader v3). */
const TagsSchema = z
  .union([
    z.array(z.union([z.string(), z.object({ name: z.string() }).passthrough()])),
    z.record(z.unknown()),
    z.null(),
  ])
  .optional()
  .transform((tags): string[] => {
    if (!tags) return [];
    if (Array.isArray(tags)) {
      return tags.map((t) => (typeof t === 'string' ? t : t.name));
    }
    return Object.keys(tags);
  });

const ReaderDocumentSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  url: optionalString,
  readwise_url: optionalString,
  source_url: optionalString,
  title: optionalString,
  author: optionalString,
  source: optionalString,
  category: optionalString,
  summary: optionalString,
  content: optionalString,
  notes: optionalString,
  saved_at: optionalString,
  updated_at: optionalString,
  tags: TagsSchema,
});

const HighlightSchema = z.object({
  id: z.union([z.number(), z.string().min(1)]).transform(String),
  text: optionalString,
  note: optionalString,
  location: z.union([z.number(), z.string()]).nullish().transform((v) => v ?? null),
  highlighted_at: optionalString,
  created_at: optionalString,
  updated: optionalString,
  updated_at: optionalString,
  url: optionalString,
  readwise_url: optionalString,
  book_id: z.union([z.number(), z.string()]).nullish().transform((v) => (v === null || v === undefined ? null : String(v))),
  tags: TagsSchema,
});

const ExportBookSchema = z.object({
  user_book_id: z.union([z.number(), z.string()]).nullish().transform((v) => (v === null || v === undefined ? null : String(v))),
  title: optionalString,
  readable_title: optionalString,
  author: optionalString,
  category: optionalString,
  source_url: optionalString,
  highlights: z.array(z.unknown()).default([]),
});

const CursorPageSchema = z.object({
  count: z.number().nullish(),
  nextPageCursor: z.union([z.string(), z.number()]).nullish().transform((v) => (v === null || v === undefined || v === '' ? null : String(v))),
  results: z.array(z.unknown()),
});

const NumberedPageSchema = z.object({
  count: z.number().nullish(),
  next: optionalString,
  results: z.array(z.unknown()),
});

type RawHighlight = z.infer<typeof HighlightSchema>;

/** Book-level metadata copied onto each exported highlight. */
export interface BookMetadata {
  bookId: string | null;
  title: string | null;
  author: string | null;
  category: string | null;
  sourceUrl: string | null;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Decode one Reader document. Returns null (and logs) when the shape is unusable. */
export function decodeDocument(data: unknown): ReaderDocument | null {
  const parsed = ReaderDocumentSchema.safeParse(data);
  if (!parsed.success) {
    console.error(`Rejected malformed document: ${describeIssues(parsed.error)}`);
    return null;
  }
  const raw = parsed.data;
  const readwiseUrl = raw.readwise_url ?? raw.url ?? `${READER_URL_BASE}/${raw.id}`;

  return {
    kind: 'document',
    // The URL is authoritative: it is what the vault scanner reads back
    id: extractIdFromUrl(readwiseUrl) ?? raw.id,
    title: raw.title ?? '',
    author: raw.author,
    source: raw.source,
    category: raw.category,
    summary: raw.summary,
    content: raw.content,
    notes: raw.notes,
    savedAt: raw.saved_at,
    updatedAt: raw.updated_at,
    readwiseUrl,
    sourceUrl: raw.source_url,
    tags: raw.tags,
    timestamp: raw.saved_at,
  };
}

function toHighlight(raw: RawHighlight, book: BookMetadata | null): Highlight {
  const updatedAt = raw.updated ?? raw.updated_at;
  return {
    kind: 'highlight',
    id: raw.id,
    text: raw.text ?? '',
    note: raw.note,
    location: raw.location,
    highlightedAt: raw.highlighted_at,
    createdAt: raw.created_at,
    updatedAt,
    readwiseUrl: raw.readwise_url ?? raw.url,
    bookId: raw.book_id ?? book?.bookId ?? null,
    sourceTitle: book?.title ?? null,
    sourceAuthor: book?.author ?? null,
    sourceType: book?.category ?? null,
    sourceUrl: book?.sourceUrl ?? null,
    tags: raw.tags,
    timestamp: updatedAt ?? raw.highlighted_at ?? raw.created_at,
  };
}

/** Decode one highlight, optionally enriched with its book's metadata. */
export function decodeHighlight(data: unknown, book: BookMetadata | null = null): Highlight | null {
  const parsed = HighlightSchema.safeParse(data);
  if (!parsed.success) {
    console.error(`Rejected malformed highlight: ${describeIssues(parsed.error)}`);
    return null;
  }
  return toHighlight(parsed.data, book);
}

function decodeItems<T>(results: unknown[], decode: (data: unknown) => T | null): { items: T[]; rejected: number } {
  const items: T[] = [];
  let rejected = 0;
  for (const result of results) {
    const item = decode(result);
    if (item) {
      items.push(item);
    } else {
      rejected++;
    }
  }
  return { items, rejected };
}

/** Decode a Reader v3 /list/ response page. */
export function decodeDocumentPage(data: unknown): Page<ReaderDocument> {
  const page = CursorPageSchema.parse(data);
  const { items, rejected } = decodeItems(page.results, decodeDocument);
  return { items, nextCursor: page.nextPageCursor, rejected };
}

/**
 * Decode a v2 /export/ response page. Books are flattened into their
 * highlights, in the order returned, each carrying the book's metadata.
 */
export function decodeExportPage(data: unknown): Page<Highlight> {
  const page = CursorPageSchema.parse(data);
  const items: Highlight[] = [];
  let rejected = 0;

  for (const result of page.results) {
    const parsedBook = ExportBookSchema.safeParse(result);
    if (!parsedBook.success) {
      console.error(`Rejected malformed export book: ${describeIssues(parsedBook.error)}`);
      rejected++;
      continue;
    }
    const book = parsedBook.data;
    const metadata: BookMetadata = {
      bookId: book.user_book_id,
      title: book.title ?? book.readable_title,
      author: book.author,
      category: book.category,
      sourceUrl: book.source_url,
    };
    const decoded = decodeItems(book.highlights, (h) => decodeHighlight(h, metadata));
    items.push(...decoded.items);
    rejected += decoded.rejected;
  }

  return { items, nextCursor: page.nextPageCursor, rejected };
}

/** Decode a v2 /highlights/ response page (highlights without book metadata). */
export function decodeHighlightListPage(data: unknown): Page<Highlight> {
  const page = NumberedPageSchema.parse(data);
  const { items, rejected } = decodeItems(page.results, (h) => decodeHighlight(h));
  return { items, nextCursor: page.next, rejected };
}
