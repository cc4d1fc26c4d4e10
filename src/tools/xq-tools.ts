/**
 * X-Q tool handler functions
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { HandoffQueue } from '../services/index.js';
import type {
  CheckXqParams,
  ClaimXqTaskParams,
  CompleteXqTaskParams,
  SetupXqParams,
} from './handler-types.js';
import { errorResult, jsonResult } from './results.js';

export async function checkXqHandler(
  queue: HandoffQueue,
  params: CheckXqParams
): Promise<CallToolResult> {
  try {
    const pending = await queue.check(params.instance || undefined);
    return jsonResult({
      count: pending.length,
      pending,
    });
  } catch (error) {
    return errorResult('checking X-Q', error);
  }
}

export async function setupXqHandler(
  queue: HandoffQueue,
  params: SetupXqParams
): Promise<CallToolResult> {
  try {
    const result = await queue.setup(params.instance || undefined);
    return jsonResult(result);
  } catch (error) {
    return errorResult('setting up X-Q', error);
  }
}

export async function claimXqTaskHandler(
  queue: HandoffQueue,
  params: ClaimXqTaskParams
): Promise<CallToolResult> {
  try {
    const item = await queue.claim(params.task_id, params.instance || undefined);
    return jsonResult({
      claimed: item.id,
      session: queue.sessionId,
      item,
    });
  } catch (error) {
    return errorResult('claiming X-Q task', error);
  }
}

export async function completeXqTaskHandler(
  queue: HandoffQueue,
  params: CompleteXqTaskParams
): Promise<CallToolResult> {
  try {
    const item = await queue.complete(params.task_id, params.destination, {
      instance: params.instance || undefined,
      notes: params.notes,
    });
    return jsonResult({
      filed: item.id,
      destination: params.destination,
      item,
    });
  } catch (error) {
    return errorResult('completing X-Q task', error);
  }
}
