/**
 * Zod schemas for the Vikunja API responses this server reads.
 * Unknown fields pass through so a task can be written back whole.
 */

import { z } from 'zod';

export const labelSchema = z
  .object({
    id: z.number(),
    title: z.string().default(''),
  })
  .passthrough();

export const taskSchema = z
  .object({
    id: z.number(),
    title: z.string().default(''),
    description: z.string().nullish(),
    done: z.boolean().optional(),
    priority: z.number().nullish(),
    due_date: z.string().nullish(),
    project_id: z.number().nullish(),
    bucket_id: z.number().nullish(),
    labels: z.array(labelSchema).nullish(),
  })
  .passthrough();

export const bucketSchema = z
  .object({
    id: z.number(),
    title: z.string().default(''),
    position: z.number().optional(),
    tasks: z.array(taskSchema).nullish(),
  })
  .passthrough();

export const projectSchema = z
  .object({
    id: z.number(),
    title: z.string().default(''),
  })
  .passthrough();

export const viewSchema = z
  .object({
    id: z.number(),
    title: z.string().default(''),
    view_kind: z.union([z.string(), z.number()]),
  })
  .passthrough();

export const errorBodySchema = z.object({ message: z.string() }).passthrough();

export type VikunjaTask = z.infer<typeof taskSchema>;
export type VikunjaBucket = z.infer<typeof bucketSchema>;
export type VikunjaView = z.infer<typeof viewSchema>;
