import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { backfillDocuments, backfillHighlights, type SyncContext } from '../sync/index.js';
import { toolResult } from './result.js';

const targetDate = z
  .string()
  .describe('Oldest date to import back to, as YYYY-MM-DD (or an ISO timestamp with a zone)');

export function registerBackfillTools(server: McpServer, ctx: SyncContext): void {
  server.registerTool(
    'readwise_backfill',
    {
      description:
        'Import older Reader documents, walking back page by page until the target date. ' +
        'Returns immediately (no API calls) when the target date is inside an already synced range. ' +
        'A category-filtered backfill imports documents but does not record a synced range.',
      inputSchema: {
        target_date: targetDate,
        category: z.string().optional().describe('Only backfill this Reader category'),
      },
    },
    async ({ target_date, category }) =>
      toolResult(await backfillDocuments(ctx, { targetDate: target_date, category })),
  );

  server.registerTool(
    'readwise_backfill_highlights',
    {
      description:
        'Import older highlights, walking back through the export until the target date. ' +
        'Skips the walk when the target date is already synced.',
      inputSchema: {
        target_date: targetDate,
      },
    },
    async ({ target_date }) => toolResult(await backfillHighlights(ctx, { targetDate: target_date })),
  );
}
