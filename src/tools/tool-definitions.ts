/**
 * Tool definitions for MCP
 * Defines metadata for all available tools
 */

import { z } from 'zod';

const instance = z
  .string()
  .optional()
  .describe('Instance name (empty = configured default instance)');

const queryInstance = z
  .string()
  .optional()
  .describe('Filter to a specific instance (empty = all instances)');

const taskId = z.number().int().positive().describe('Task ID');

/**
 * Zod schema for tool input parameters
 */
export const toolSchemas = {
  // X-Q tools
  check_xq: z.object({
    instance,
  }),

  setup_xq: z.object({
    instance,
  }),

  claim_xq_task: z.object({
    instance,
    task_id: taskId.describe('Task ID to claim'),
  }),

  complete_xq_task: z.object({
    instance,
    task_id: taskId,
    destination: z.string().min(1).describe('Where the work was filed (project/task reference)'),
    notes: z.string().optional().describe('Optional notes recorded with the filing'),
  }),

  // Power query tools
  overdue_tasks: z.object({ instance: queryInstance }),
  due_today: z.object({ instance: queryInstance }),
  due_this_week: z.object({ instance: queryInstance }),
  high_priority_tasks: z.object({ instance: queryInstance }),
  urgent_tasks: z.object({ instance: queryInstance }),
  unscheduled_tasks: z.object({ instance: queryInstance }),
  task_summary: z.object({ instance: queryInstance }),

  focus_now: z.object({
    instance: queryInstance,
    limit: z.number().int().min(0).optional().describe('Max tasks (default: 10, 0 = all)'),
  }),

  upcoming_deadlines: z.object({
    instance: queryInstance,
    days: z.number().int().positive().optional().describe('Days to look ahead (default: 3)'),
  }),
};

export type ToolName = keyof typeof toolSchemas;

export interface JsonObjectSchema {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
}

function jsonSchemaFor(type: z.ZodTypeAny): Record<string, unknown> {
  if (type instanceof z.ZodOptional) {
    return jsonSchemaFor(type.unwrap());
  }
  if (type instanceof z.ZodDefault) {
    return jsonSchemaFor(type.removeDefault());
  }
  if (type instanceof z.ZodString) {
    return { type: 'string' };
  }
  if (type instanceof z.ZodNumber) {
    const schema: Record<string, unknown> = { type: type.isInt ? 'integer' : 'number' };
    for (const check of type._def.checks) {
      if (check.kind === 'min') {
        schema[check.inclusive ? 'minimum' : 'exclusiveMinimum'] = check.value;
      }
    }
    return schema;
  }
  if (type instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }
  if (type instanceof z.ZodArray) {
    return { type: 'array', items: jsonSchemaFor(type.element) };
  }
  if (type instanceof z.ZodEnum) {
    return { type: 'string', enum: type.options };
  }
  return {};
}

/**
 * Convert Zod schema to JSON Schema for MCP tool metadata
 */
export function zodToJsonSchema(schema: z.AnyZodObject): JsonObjectSchema {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    properties[key] = {
      ...jsonSchemaFor(value),
      ...(value.description ? { description: value.description } : {}),
    };

    if (!(value instanceof z.ZodOptional) && !(value instanceof z.ZodDefault)) {
      required.push(key);
    }
  }

  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

/**
 * Tool metadata in MCP format
 */
export const toolDefinitions = [
  // X-Q tools
  {
    name: 'check_xq',
    description: 'Check X-Q (Exchange Queue) for handoff items waiting in the Handoff bucket',
    inputSchema: zodToJsonSchema(toolSchemas.check_xq),
  },
  {
    name: 'setup_xq',
    description: 'Create the Handoff, Review and Filed buckets in the X-Q project (safe to rerun)',
    inputSchema: zodToJsonSchema(toolSchemas.setup_xq),
  },
  {
    name: 'claim_xq_task',
    description:
      'Claim an X-Q task for this session and move it to Review. Fails with AlreadyClaimed or LostRace when another session got it first',
    inputSchema: zodToJsonSchema(toolSchemas.claim_xq_task),
  },
  {
    name: 'complete_xq_task',
    description:
      'Complete a claimed X-Q task: record the destination, release the claim, mark it done and move it to Filed',
    inputSchema: zodToJsonSchema(toolSchemas.complete_xq_task),
  },

  // Power query tools
  {
    name: 'overdue_tasks',
    description: 'Get open tasks past their due date',
    inputSchema: zodToJsonSchema(toolSchemas.overdue_tasks),
  },
  {
    name: 'due_today',
    description: 'Get tasks due today plus overdue ones',
    inputSchema: zodToJsonSchema(toolSchemas.due_today),
  },
  {
    name: 'due_this_week',
    description: 'Get tasks due in the next 7 days plus overdue ones',
    inputSchema: zodToJsonSchema(toolSchemas.due_this_week),
  },
  {
    name: 'high_priority_tasks',
    description: 'Get open tasks with priority >= 3',
    inputSchema: zodToJsonSchema(toolSchemas.high_priority_tasks),
  },
  {
    name: 'urgent_tasks',
    description: 'Get open tasks with priority >= 4 (critical)',
    inputSchema: zodToJsonSchema(toolSchemas.urgent_tasks),
  },
  {
    name: 'unscheduled_tasks',
    description: 'Get open tasks without a due date',
    inputSchema: zodToJsonSchema(toolSchemas.unscheduled_tasks),
  },
  {
    name: 'task_summary',
    description: 'Task counts only (overdue, due today, this week, priority, unscheduled). Fastest overview',
    inputSchema: zodToJsonSchema(toolSchemas.task_summary),
  },
  {
    name: 'focus_now',
    description: "Tasks needing attention now: priority >= 4 or overdue. Best for 'what should I work on?'",
    inputSchema: zodToJsonSchema(toolSchemas.focus_now),
  },
  {
    name: 'upcoming_deadlines',
    description: 'Get tasks due in the next N days (excluding overdue)',
    inputSchema: zodToJsonSchema(toolSchemas.upcoming_deadlines),
  },
];
