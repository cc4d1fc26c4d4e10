/**
 * Shared type definitions for the Vikunja MCP server
 */

// Normalized remote shapes consumed by the services

export interface RemoteTask {
  id: number;
  title: string;
  description: string;
  done: boolean;
  priority: number;
  dueDate: string | null;
  projectId: number | null;
  bucketId: number | null;
}

export interface RemoteBucket {
  id: number;
  title: string;
}

export interface RemoteProject {
  id: number;
  title: string;
}

export interface TaskUpdateFields {
  description?: string;
  done?: boolean;
  bucketId?: number;
}

/**
 * Operations the services need from the remote task service.
 * Implemented against Vikunja by VikunjaClient and in memory by the tests.
 */
export interface RemoteTaskClient {
  listBuckets(projectId: number): Promise<RemoteBucket[]>;
  createBucket(projectId: number, name: string): Promise<RemoteBucket>;
  listBucketTasks(projectId: number, bucketId: number): Promise<RemoteTask[]>;
  getTask(taskId: number): Promise<RemoteTask>;
  updateTask(taskId: number, fields: TaskUpdateFields): Promise<RemoteTask>;
  listProjects(): Promise<RemoteProject[]>;
  listProjectTasks(projectId: number): Promise<RemoteTask[]>;
}

// Instances

export interface InstanceConfig {
  name: string;
  baseUrl: string;
  token: string;
}

export interface HandoffProjectRef extends InstanceConfig {
  projectId: number;
}

export interface InstanceResolver {
  listInstances(): string[];
  defaultInstance(): string | null;
  getInstance(name?: string): InstanceConfig;
  resolveHandoffProject(name?: string): HandoffProjectRef;
}

export type RemoteClientFactory = (instance: InstanceConfig) => RemoteTaskClient;

// Exchange queue

export type HandoffState = 'handoff' | 'review' | 'filed';

export interface ClaimMarker {
  by: string;
  at: string;
}

export interface FiledMarker {
  to: string;
  at: string;
  notes?: string;
}

export interface HandoffItem {
  id: number;
  title: string;
  description: string;
  state: HandoffState | null;
  bucketId: number | null;
  done: boolean;
  claim: ClaimMarker | null;
  filed: FiledMarker | null;
  instance: string;
  projectId: number;
}

export type HandoffBucketIds = Record<HandoffState, number>;

export interface SetupResult {
  instance: string;
  projectId: number;
  bucketIds: HandoffBucketIds;
  created: string[];
  existing: string[];
}

// Power queries

export interface QueryTask {
  id: number;
  title: string;
  priority: number;
  due_date: string | null;
  project: string;
  instance: string;
  overdue?: boolean;
}

export interface QueryFailure {
  instance: string;
  error: string;
}

export interface QueryResult {
  tasks: QueryTask[];
  count: number;
  errors?: QueryFailure[];
}

export interface FocusResult extends QueryResult {
  total_matching: number;
}

export interface TaskSummary {
  total: number;
  overdue: number;
  due_today: number;
  due_this_week: number;
  high_priority: number;
  urgent: number;
  unscheduled: number;
  errors?: QueryFailure[];
}
