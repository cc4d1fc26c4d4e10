/**
 * Type definitions for tool handler parameters
 */

import type { z } from 'zod';
import type { toolSchemas } from './tool-definitions.js';

// X-Q handler parameter types
export type CheckXqParams = z.infer<typeof toolSchemas.check_xq>;
export type SetupXqParams = z.infer<typeof toolSchemas.setup_xq>;
export type ClaimXqTaskParams = z.infer<typeof toolSchemas.claim_xq_task>;
export type CompleteXqTaskParams = z.infer<typeof toolSchemas.complete_xq_task>;

// Power query handler parameter types
export type InstanceQueryParams = z.infer<typeof toolSchemas.overdue_tasks>;
export type FocusNowParams = z.infer<typeof toolSchemas.focus_now>;
export type UpcomingDeadlinesParams = z.infer<typeof toolSchemas.upcoming_deadlines>;
