import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { HandoffError, errorMessage } from '../utils/index.js';

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function textResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text' as const, text }],
  };
}

/**
 * X-Q errors carry their kind, operation and task so the calling session can
 * decide between picking another item, retrying, or asking the human
 */
export function errorResult(action: string, error: unknown): CallToolResult {
  const payload =
    error instanceof HandoffError
      ? {
          error: `Error ${action}: ${error.message}`,
          kind: error.kind,
          operation: error.operation,
          ...(error.taskId !== undefined ? { task_id: error.taskId } : {}),
        }
      : { error: `Error ${action}: ${errorMessage(error)}` };

  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
    isError: true,
  };
}
