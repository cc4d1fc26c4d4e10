/**
 * MCP tool handlers
 * Implements ListTools and CallTool request handlers
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { HandoffQueue, PowerQueryService } from '../services/index.js';
import { errorMessage, logger } from '../utils/index.js';
import { toolDefinitions, toolSchemas } from './tool-definitions.js';
import {
  checkXqHandler,
  claimXqTaskHandler,
  completeXqTaskHandler,
  setupXqHandler,
} from './xq-tools.js';
import {
  dueThisWeekHandler,
  dueTodayHandler,
  focusNowHandler,
  highPriorityTasksHandler,
  overdueTasksHandler,
  taskSummaryHandler,
  unscheduledTasksHandler,
  upcomingDeadlinesHandler,
  urgentTasksHandler,
} from './query-tools.js';
import { textResult } from './results.js';

/**
 * Validate arguments and route a tool call to its handler
 */
export async function dispatchTool(
  name: string,
  args: unknown,
  queue: HandoffQueue,
  queries: PowerQueryService
): Promise<CallToolResult> {
  const input = args ?? {};

  switch (name) {
    // X-Q tools
    case 'check_xq':
      return checkXqHandler(queue, toolSchemas.check_xq.parse(input));
    case 'setup_xq':
      return setupXqHandler(queue, toolSchemas.setup_xq.parse(input));
    case 'claim_xq_task':
      return claimXqTaskHandler(queue, toolSchemas.claim_xq_task.parse(input));
    case 'complete_xq_task':
      return completeXqTaskHandler(queue, toolSchemas.complete_xq_task.parse(input));

    // Power query tools
    case 'overdue_tasks':
      return overdueTasksHandler(queries, toolSchemas.overdue_tasks.parse(input));
    case 'due_today':
      return dueTodayHandler(queries, toolSchemas.due_today.parse(input));
    case 'due_this_week':
      return dueThisWeekHandler(queries, toolSchemas.due_this_week.parse(input));
    case 'high_priority_tasks':
      return highPriorityTasksHandler(queries, toolSchemas.high_priority_tasks.parse(input));
    case 'urgent_tasks':
      return urgentTasksHandler(queries, toolSchemas.urgent_tasks.parse(input));
    case 'unscheduled_tasks':
      return unscheduledTasksHandler(queries, toolSchemas.unscheduled_tasks.parse(input));
    case 'task_summary':
      return taskSummaryHandler(queries, toolSchemas.task_summary.parse(input));
    case 'focus_now':
      return focusNowHandler(queries, toolSchemas.focus_now.parse(input));
    case 'upcoming_deadlines':
      return upcomingDeadlinesHandler(queries, toolSchemas.upcoming_deadlines.parse(input));

    default:
      logger.warn(`Unknown tool requested: ${name}`);
      return { ...textResult(`Unknown tool: ${name}`), isError: true };
  }
}

/**
 * Register MCP tool handlers with the server
 */
export function registerToolHandlers(
  server: Server,
  queue: HandoffQueue,
  queries: PowerQueryService
): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: toolDefinitions,
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const startTime = Date.now();

    logger.logToolCall(name, args);

    try {
      const result = await dispatchTool(name, args, queue, queries);
      logger.logToolResult(name, result, Date.now() - startTime);
      return result;
    } catch (error) {
      // Handlers report their own failures; anything here is argument validation
      const duration = Date.now() - startTime;
      logger.logToolError(
        name,
        error instanceof Error ? error : new Error(String(error)),
        args,
        duration
      );

      return {
        ...textResult(`Error calling tool ${name}: ${errorMessage(error)}`),
        isError: true,
      };
    }
  });
}
