/**
 * Render upstream items as Markdown files with YAML frontmatter.
 *
 * The frontmatter carries the item's Readwise URL (documents) or highlight
 * ID (highlights) so the vault scanner can rebuild dedup state from the
 * files alone. Null fields are left out.
 */

import matter from 'gray-matter';
import type { Highlight, ReaderDocument } from '../types.js';
import { parseTimestamp, toDateString } from '../time.js';

function compact(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null && value !== undefined) result[key] = value;
  }
  return result;
}

/** Frontmatter fields written for a document. */
export function documentFrontmatter(doc: ReaderDocument): Record<string, unknown> {
  return compact({
    title: doc.title || 'Untitled',
    author: doc.author,
    source: doc.source,
    category: doc.category,
    saved_at: doc.savedAt,
    updated_at: doc.updatedAt,
    readwise_url: doc.readwiseUrl,
    source_url: doc.sourceUrl,
    tags: doc.tags,
  });
}

/** Convert a document to Markdown with YAML frontmatter. */
export function documentToMarkdown(doc: ReaderDocument): string {
  let body = '';
  if (doc.summary) body += `## Summary\n\n${doc.summary}\n\n`;
  if (doc.content) body += `## Content\n\n${doc.content}\n\n`;
  if (doc.notes) body += `## Notes\n\n${doc.notes}\n\n`;

  return matter.stringify(body, documentFrontmatter(doc));
}

/** Frontmatter fields written for a highlight. */
export function highlightFrontmatter(highlight: Highlight): Record<string, unknown> {
  return compact({
    highlight_id: highlight.id,
    text: highlight.text.slice(0, 100),
    source_title: highlight.sourceTitle,
    source_author: highlight.sourceAuthor,
    source_type: highlight.sourceType,
    source_url: highlight.sourceUrl,
    highlighted_at: highlight.highlightedAt ?? highlight.createdAt,
    updated_at: highlight.updatedAt,
    location: highlight.location,
    readwise_url: highlight.readwiseUrl,
    tags: highlight.tags,
  });
}

/** Convert a highlight to Markdown with YAML frontmatter. */
export function highlightToMarkdown(highlight: Highlight, now: Date): string {
  const highlighted = parseTimestamp(highlight.highlightedAt ?? highlight.createdAt);

  let body = `# ${highlight.sourceTitle ?? 'Unknown Source'}\n`;
  if (highlight.sourceAuthor) {
    body += `*${highlight.sourceAuthor}*\n\n`;
  } else {
    body += '\n';
  }

  body += '## Highlight\n\n';
  body += `> "${highlight.text}"\n\n`;

  const info: string[] = [];
  if (highlight.location !== null && highlight.location !== '') {
    info.push(`**Location**: ${highlight.location}`);
  }
  if (highlighted) {
    info.push(`**Highlighted**: ${toDateString(highlighted)}`);
  }
  if (info.length > 0) body += info.join(' | ') + '\n\n';

  if (highlight.note) body += `**Note**: ${highlight.note}\n\n`;

  body += '---\n\n';
  if (highlight.sourceUrl) body += `**Source**: ${highlight.sourceUrl}\n`;
  if (highlight.readwiseUrl) body += `**Readwise**: ${highlight.readwiseUrl}\n`;
  body += `\n*Imported from Readwise Highlights on ${toDateString(now)}*\n`;

  return matter.stringify(body, highlightFrontmatter(highlight));
}

/** Daily review note: one section per highlight. */
export function dailyReviewToMarkdown(highlights: Highlight[], date: string): string {
  let markdown = `# Daily Review - ${date}\n\n`;
  for (const highlight of highlights) {
    markdown += `## ${highlight.text}\n\n`;
    if (highlight.note) markdown += `**Note**: ${highlight.note}\n\n`;
    markdown += `**Source**: ${highlight.sourceUrl ?? highlight.readwiseUrl ?? 'Unknown'}\n\n---\n\n`;
  }
  return markdown;
}
