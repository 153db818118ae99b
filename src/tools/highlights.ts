import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { bookHighlights, dailyReview, searchHighlights, type SyncContext } from '../sync/index.js';
import { toolResult } from './result.js';

export function registerHighlightTools(server: McpServer, ctx: SyncContext): void {
  server.registerTool(
    'readwise_daily_review',
    {
      description: "Write today's review note with the latest highlights to the Daily Reviews folder.",
      inputSchema: {},
    },
    async () => toolResult(await dailyReview(ctx)),
  );

  server.registerTool(
    'readwise_book_highlights',
    {
      description: 'List highlights (up to 50) from one book, found by Readwise book ID or by title.',
      inputSchema: {
        title: z.string().optional().describe('Case-insensitive substring of the book title'),
        book_id: z.string().optional().describe('Readwise book ID'),
      },
    },
    async ({ title, book_id }) => toolResult(await bookHighlights(ctx, { title, bookId: book_id })),
  );

  server.registerTool(
    'readwise_search_highlights',
    {
      description: 'Search the latest highlights by text or note (case-insensitive).',
      inputSchema: {
        query: z.string().min(1).describe('Text to search for'),
        limit: z.number().int().min(1).max(100).optional().describe('Maximum results (default: 50)'),
      },
    },
    async ({ query, limit }) => toolResult(await searchHighlights(ctx, { query, limit })),
  );
}
