import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/** Wrap an operation result as tool output; error results are flagged. */
export function toolResult(result: { status: string }): CallToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(result),
      },
    ],
    ...(result.status === 'error' ? { isError: true } : {}),
  };
}
