import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { importRecentDocuments, importRecentHighlights, type SyncContext } from '../sync/index.js';
import { toolResult } from './result.js';

export function registerImportTools(server: McpServer, ctx: SyncContext): void {
  server.registerTool(
    'readwise_import_recent',
    {
      description:
        'Import Reader documents saved or updated since the last import into the vault. ' +
        'Documents already in the vault (matched by Readwise ID, then by file name) are skipped. ' +
        'Advances the last-import timestamp only when every document was saved.',
      inputSchema: {
        category: z
          .string()
          .optional()
          .describe('Reader category to import (article, email, rss, highlight, note, pdf, epub, tweet, video)'),
        limit: z
          .number()
          .int()
          .min(1)
          .max(100)
          .optional()
          .describe('Maximum number of documents to fetch (default: 20)'),
      },
    },
    async ({ category, limit }) => toolResult(await importRecentDocuments(ctx, { category, limit })),
  );

  server.registerTool(
    'readwise_import_recent_highlights',
    {
      description:
        'Import highlights (from books, articles and other sources) updated since the last highlight import. ' +
        'Each highlight is written as its own note.',
      inputSchema: {
        limit: z
          .number()
          .int()
          .min(1)
          .max(1000)
          .optional()
          .describe('Page size requested from the export endpoint (default: 100)'),
      },
    },
    async ({ limit }) => toolResult(await importRecentHighlights(ctx, { limit })),
  );
}
