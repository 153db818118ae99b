import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { INSTRUCTIONS } from './instructions.js';
import type { SyncContext } from './sync/index.js';
import { registerImportTools } from './tools/import.js';
import { registerBackfillTools } from './tools/backfill.js';
import { registerStateTools } from './tools/state.js';
import { registerHighlightTools } from './tools/highlights.js';

export const SERVER_NAME = 'readwise-vault-mcp';
export const SERVER_VERSION = '1.0.0';

/** Create the MCP server with every tool registered against one context. */
export function createServer(ctx: SyncContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS },
  );

  registerImportTools(server, ctx);
  registerBackfillTools(server, ctx);
  registerStateTools(server, ctx);
  registerHighlightTools(server, ctx);

  return server;
}
