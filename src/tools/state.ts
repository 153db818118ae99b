import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getStateInfo, rebuildRanges, resetState, type SyncContext } from '../sync/index.js';
import { STATE_SECTIONS } from '../types.js';
import { toolResult } from './result.js';

export function registerStateTools(server: McpServer, ctx: SyncContext): void {
  server.registerTool(
    'readwise_state_info',
    {
      description:
        'Show import state: last import time, oldest imported date, synced ranges, ' +
        'whether a backfill was interrupted, and how many files the vault holds.',
      inputSchema: {
        section: z
          .enum(STATE_SECTIONS)
          .optional()
          .describe('Only show this section (default: both)'),
      },
    },
    async ({ section }) => toolResult(await getStateInfo(ctx, section)),
  );

  server.registerTool(
    'readwise_init_ranges',
    {
      description:
        'Rebuild synced ranges from the files already in the vault. ' +
        'Replaces the recorded ranges with the single span covered by the files found.',
      inputSchema: {
        section: z
          .enum(STATE_SECTIONS)
          .optional()
          .describe('Which section to rebuild (default: documents)'),
      },
    },
    async ({ section }) => toolResult(await rebuildRanges(ctx, section)),
  );

  server.registerTool(
    'readwise_reset_state',
    {
      description:
        'Reset import progress so the next recent import starts from scratch. ' +
        'Synced ranges are kept unless clear_ranges is true.',
      inputSchema: {
        section: z
          .enum(['documents', 'highlights', 'all'])
          .optional()
          .describe('Which section to reset (default: all)'),
        clear_ranges: z
          .boolean()
          .optional()
          .describe('Also clear synced ranges and the oldest imported date (default: false)'),
      },
    },
    async ({ section, clear_ranges }) =>
      toolResult(await resetState(ctx, { section, clearRanges: clear_ranges })),
  );
}
