/**
 * In-memory RemoteTaskClient used in place of a Vikunja instance.
 * State changes happen when a method is called, before it yields.
 */

import type {
  RemoteBucket,
  RemoteProject,
  RemoteTask,
  RemoteTaskClient,
  TaskUpdateFields,
} from '../../src/types/index.js';
import { VikunjaApiError } from '../../src/utils/index.js';

type ClientMethod = keyof RemoteTaskClient;

export interface FakeTaskInput {
  title: string;
  projectId: number;
  description?: string;
  bucketId?: number | null;
  priority?: number;
  dueDate?: string | null;
  done?: boolean;
}

export class FakeVikunja implements RemoteTaskClient {
  readonly projects: RemoteProject[] = [];
  readonly calls: ClientMethod[] = [];
  /** Runs after every updateTask write, e.g. to inject a competing session's write */
  afterUpdate: ((taskId: number) => void) | null = null;
  /** Accept updates but leave tasks in their bucket, as when the server overrides the move */
  ignoreBucketMoves = false;

  private readonly buckets = new Map<number, RemoteBucket[]>();
  private readonly tasks = new Map<number, RemoteTask>();
  private readonly failures = new Map<ClientMethod, Error>();
  private readonly projectFailures = new Map<number, Error>();
  private nextTaskId = 1;
  private nextBucketId = 100;

  addProject(id: number, title: string): this {
    this.projects.push({ id, title });
    return this;
  }

  addBucket(projectId: number, title: string): RemoteBucket {
    const bucket = { id: this.nextBucketId++, title };
    this.buckets.set(projectId, [...(this.buckets.get(projectId) ?? []), bucket]);
    return { ...bucket };
  }

  addTask(input: FakeTaskInput): RemoteTask {
    const task: RemoteTask = {
      id: this.nextTaskId++,
      title: input.title,
      description: input.description ?? '',
      done: input.done ?? false,
      priority: input.priority ?? 0,
      dueDate: input.dueDate ?? null,
      projectId: input.projectId,
      bucketId: input.bucketId ?? null,
    };
    this.tasks.set(task.id, task);
    return { ...task };
  }

  /** Direct write that bypasses call recording and failure injection */
  overwriteTask(taskId: number, fields: Partial<RemoteTask>): void {
    const task = this.tasks.get(taskId);
    if (task) {
      this.tasks.set(taskId, { ...task, ...fields });
    }
  }

  failOn(method: ClientMethod, error: Error): void {
    this.failures.set(method, error);
  }

  failProject(projectId: number, error: Error): void {
    this.projectFailures.set(projectId, error);
  }

  peekTask(taskId: number): RemoteTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  bucketsOf(projectId: number): RemoteBucket[] {
    return (this.buckets.get(projectId) ?? []).map((b) => ({ ...b }));
  }

  async listBuckets(projectId: number): Promise<RemoteBucket[]> {
    this.record('listBuckets');
    return this.bucketsOf(projectId);
  }

  async createBucket(projectId: number, name: string): Promise<RemoteBucket> {
    this.record('createBucket');
    return this.addBucket(projectId, name);
  }

  async listBucketTasks(projectId: number, bucketId: number): Promise<RemoteTask[]> {
    this.record('listBucketTasks');
    return [...this.tasks.values()]
      .filter((t) => t.projectId === projectId && t.bucketId === bucketId)
      .map((t) => ({ ...t }));
  }

  async getTask(taskId: number): Promise<RemoteTask> {
    this.record('getTask');
    return { ...this.requireTask(taskId) };
  }

  async updateTask(taskId: number, fields: TaskUpdateFields): Promise<RemoteTask> {
    this.record('updateTask');
    const task = this.requireTask(taskId);
    const updated: RemoteTask = {
      ...task,
      description: fields.description ?? task.description,
      done: fields.done ?? task.done,
      bucketId: this.ignoreBucketMoves ? task.bucketId : (fields.bucketId ?? task.bucketId),
    };
    this.tasks.set(taskId, updated);

    if (this.afterUpdate) {
      this.afterUpdate(taskId);
    }
    return { ...updated };
  }

  async listProjects(): Promise<RemoteProject[]> {
    this.record('listProjects');
    return this.projects.map((p) => ({ ...p }));
  }

  async listProjectTasks(projectId: number): Promise<RemoteTask[]> {
    this.record('listProjectTasks');
    const failure = this.projectFailures.get(projectId);
    if (failure) {
      throw failure;
    }
    return [...this.tasks.values()]
      .filter((t) => t.projectId === projectId)
      .map((t) => ({ ...t }));
  }

  private record(method: ClientMethod): void {
    this.calls.push(method);
    const failure = this.failures.get(method);
    if (failure) {
      throw failure;
    }
  }

  private requireTask(taskId: number): RemoteTask {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new VikunjaApiError(404, 'The task does not exist.');
    }
    return task;
  }
}
