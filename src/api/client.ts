/**
 * Vikunja REST client
 *
 * Implements RemoteTaskClient against /api/v1 of one Vikunja instance.
 * Kanban buckets live on the project's kanban view, which is looked up on
 * every call rather than cached: users may recreate views and buckets.
 */

import { z } from 'zod';
import type {
  InstanceConfig,
  RemoteBucket,
  RemoteProject,
  RemoteTask,
  RemoteTaskClient,
  TaskUpdateFields,
} from '../types/index.js';
import { ConfigError, VikunjaApiError, errorMessage, logger } from '../utils/index.js';
import {
  bucketSchema,
  errorBodySchema,
  projectSchema,
  taskSchema,
  viewSchema,
  type VikunjaBucket,
  type VikunjaTask,
  type VikunjaView,
} from './schemas.js';

export interface VikunjaClientOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE';

const DEFAULT_TIMEOUT_MS = 30000;
const NO_DATE = '0001-01-01T00:00:00Z';
const KANBAN_VIEW_KIND = 3;
/** Vikunja's default max items per page; kanban tasks are paged per bucket */
const KANBAN_PAGE_SIZE = 50;

export class VikunjaClient implements RemoteTaskClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly instance: InstanceConfig,
    options: VikunjaClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async listProjects(): Promise<RemoteProject[]> {
    const projects = await this.request('GET', '/projects', z.array(projectSchema));
    return projects.map((p) => ({ id: p.id, title: p.title }));
  }

  async listProjectTasks(projectId: number): Promise<RemoteTask[]> {
    const tasks = await this.request('GET', `/projects/${projectId}/tasks`, z.array(taskSchema));
    return tasks.map((t) => normalizeTask(t));
  }

  async listBuckets(projectId: number): Promise<RemoteBucket[]> {
    const view = await this.getKanbanView(projectId);
    const buckets = await this.request(
      'GET',
      `/projects/${projectId}/views/${view.id}/buckets`,
      z.array(bucketSchema)
    );
    return buckets.map((b) => ({ id: b.id, title: b.title }));
  }

  async createBucket(projectId: number, name: string): Promise<RemoteBucket> {
    const view = await this.getKanbanView(projectId);
    const bucket = await this.request(
      'PUT',
      `/projects/${projectId}/views/${view.id}/buckets`,
      bucketSchema,
      { title: name }
    );
    return { id: bucket.id, title: bucket.title };
  }

  async listBucketTasks(projectId: number, bucketId: number): Promise<RemoteTask[]> {
    const view = await this.getKanbanView(projectId);
    const tasks: RemoteTask[] = [];

    for (let page = 1; ; page++) {
      const buckets = await this.listKanbanPage(projectId, view.id, page);
      const batch = buckets.find((b) => b.id === bucketId)?.tasks ?? [];
      tasks.push(...batch.map((t) => normalizeTask(t, bucketId)));
      if (batch.length < KANBAN_PAGE_SIZE) {
        return tasks;
      }
    }
  }

  async getTask(taskId: number): Promise<RemoteTask> {
    const task = await this.request('GET', `/tasks/${taskId}`, taskSchema);
    return this.withBucket(task);
  }

  /**
   * Writes description and done first, then moves the task through the kanban
   * view. Done handling on the write may move the task to the project's done
   * bucket; the explicit move runs afterwards and wins.
   */
  async updateTask(taskId: number, fields: TaskUpdateFields): Promise<RemoteTask> {
    // POST /tasks/{id} replaces the whole task, so send the current one with the changes applied
    const current = await this.request('GET', `/tasks/${taskId}`, taskSchema);
    const body: VikunjaTask = { ...current };

    if (fields.description !== undefined) {
      body.description = fields.description;
    }
    if (fields.done !== undefined) {
      body.done = fields.done;
    }

    const updated = await this.request('POST', `/tasks/${taskId}`, taskSchema, body);
    if (fields.bucketId === undefined) {
      return this.withBucket(updated);
    }

    const projectId = updated.project_id || current.project_id;
    if (!projectId) {
      throw new Error(`Task ${taskId} has no project to move it within`);
    }
    const view = await this.getKanbanView(projectId);
    await this.request(
      'POST',
      `/projects/${projectId}/views/${view.id}/buckets/${fields.bucketId}/tasks`,
      z.unknown(),
      { task_id: taskId }
    );

    return this.getTask(taskId);
  }

  private async getKanbanView(projectId: number): Promise<VikunjaView> {
    const views = await this.request('GET', `/projects/${projectId}/views`, z.array(viewSchema));
    const kanban = views.find((v) => v.view_kind === 'kanban' || v.view_kind === KANBAN_VIEW_KIND);

    if (!kanban) {
      throw new ConfigError(`Project ${projectId} has no kanban view`);
    }
    return kanban;
  }

  private listKanbanPage(projectId: number, viewId: number, page: number): Promise<VikunjaBucket[]> {
    return this.request(
      'GET',
      `/projects/${projectId}/views/${viewId}/tasks?page=${page}&per_page=${KANBAN_PAGE_SIZE}`,
      z.array(bucketSchema)
    );
  }

  /**
   * Newer Vikunja releases leave bucket_id empty on task reads; derive it from the kanban view
   */
  private async withBucket(task: VikunjaTask): Promise<RemoteTask> {
    if (task.bucket_id || !task.project_id) {
      return normalizeTask(task);
    }

    const view = await this.getKanbanView(task.project_id);
    for (let page = 1; ; page++) {
      const buckets = await this.listKanbanPage(task.project_id, view.id, page);
      const holder = buckets.find((b) => (b.tasks ?? []).some((t) => t.id === task.id));
      if (holder) {
        return normalizeTask(task, holder.id);
      }
      if (!buckets.some((b) => (b.tasks ?? []).length >= KANBAN_PAGE_SIZE)) {
        return normalizeTask(task);
      }
    }
  }

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    endpoint: string,
    schema: S,
    body?: unknown
  ): Promise<z.infer<S>> {
    const url = `${this.instance.baseUrl}/api/v1${endpoint}`;
    logger.logRemoteCall(method, endpoint, this.instance.name);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.instance.token}`,
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new Error(`Vikunja request ${method} ${endpoint} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new VikunjaApiError(response.status, await readErrorMessage(response));
    }

    const json: unknown = response.status === 204 ? {} : await response.json();
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new Error(
        `Unexpected response from ${method} ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`
      );
    }
    return parsed.data;
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const body = errorBodySchema.safeParse(JSON.parse(text));
    return body.success ? body.data.message : text;
  } catch {
    return text;
  }
}

export function normalizeTask(task: VikunjaTask, bucketId?: number): RemoteTask {
  const due = task.due_date && task.due_date !== NO_DATE ? task.due_date : null;
  return {
    id: task.id,
    title: task.title,
    description: task.description ?? '',
    done: task.done ?? false,
    priority: task.priority ?? 0,
    dueDate: due,
    projectId: task.project_id ?? null,
    bucketId: task.bucket_id || bucketId || null,
  };
}
