/**
 * Power query tool handler functions
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { PowerQueryService } from '../services/index.js';
import type { FocusNowParams, InstanceQueryParams, UpcomingDeadlinesParams } from './handler-types.js';
import { errorResult, jsonResult } from './results.js';

type InstanceQuery = (queries: PowerQueryService, instance?: string) => Promise<unknown>;

async function runQuery(
  label: string,
  queries: PowerQueryService,
  params: InstanceQueryParams,
  query: InstanceQuery
): Promise<CallToolResult> {
  try {
    return jsonResult(await query(queries, params.instance || undefined));
  } catch (error) {
    return errorResult(`querying ${label}`, error);
  }
}

export function overdueTasksHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('overdue tasks', queries, params, (q, instance) => q.overdue(instance));
}

export function dueTodayHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('tasks due today', queries, params, (q, instance) => q.dueToday(instance));
}

export function dueThisWeekHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('tasks due this week', queries, params, (q, instance) => q.dueThisWeek(instance));
}

export function highPriorityTasksHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('high priority tasks', queries, params, (q, instance) => q.highPriority(instance));
}

export function urgentTasksHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('urgent tasks', queries, params, (q, instance) => q.urgent(instance));
}

export function unscheduledTasksHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('unscheduled tasks', queries, params, (q, instance) => q.unscheduled(instance));
}

export function taskSummaryHandler(queries: PowerQueryService, params: InstanceQueryParams) {
  return runQuery('task summary', queries, params, (q, instance) => q.summary(instance));
}

export function focusNowHandler(queries: PowerQueryService, params: FocusNowParams) {
  return runQuery('focus tasks', queries, params, (q, instance) =>
    q.focusNow(instance, params.limit ?? 10)
  );
}

export function upcomingDeadlinesHandler(
  queries: PowerQueryService,
  params: UpcomingDeadlinesParams
) {
  return runQuery('upcoming deadlines', queries, params, (q, instance) =>
    q.upcomingDeadlines(params.days ?? 3, instance)
  );
}
