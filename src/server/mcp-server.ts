/**
 * MCP server factory
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { HandoffQueue, PowerQueryService } from '../services/index.js';
import { registerToolHandlers } from '../tools/index.js';

export const SERVER_NAME = 'vikunja-mcp';
export const SERVER_VERSION = '1.0.0';

const INSTRUCTIONS = `Vikunja task queries and the X-Q (Exchange Queue) handoff mailbox.

X-Q for handoffs between sessions:
- check_xq() - items waiting in the Handoff bucket
- claim_xq_task() - take an item into Review; AlreadyClaimed/LostRace mean pick another item
- complete_xq_task() - record where the work was filed and move it to Filed
- setup_xq() - create the buckets once per instance

Claims belong to the server process, not the client. Over HTTP every client
shares one X-Q session, so complete_xq_task cannot tell those clients apart.

Quick queries:
- focus_now() - tasks needing immediate attention
- due_today() - today's tasks + overdue
- task_summary() - counts only, fastest`;

export function createMcpServer(queue: HandoffQueue, queries: PowerQueryService): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: INSTRUCTIONS,
    }
  );

  registerToolHandlers(server, queue, queries);

  return server;
}
