/**
 * X-Q (Exchange Queue) service
 *
 * A Vikunja project with three kanban buckets serves as a mailbox between
 * independent assistant sessions. Bucket membership is the item state; claim
 * and destination markers live in the task description.
 *
 * Vikunja offers no compare-and-swap, so claim writes the marker and the
 * bucket move in one update and then re-reads the task. A competing write
 * that lands before the re-read shows up as LostRace. One that lands after it
 * (a slower session whose check passed before our write) is not seen: both
 * calls return success and the marker left on the task names the real owner,
 * which complete then enforces.
 */

import type {
  ClaimMarker,
  FiledMarker,
  HandoffBucketIds,
  HandoffItem,
  HandoffProjectRef,
  HandoffState,
  InstanceResolver,
  RemoteClientFactory,
  RemoteTask,
  RemoteTaskClient,
  SetupResult,
} from '../types/index.js';
import {
  HandoffError,
  logger,
  toHandoffError,
  type HandoffOperation,
} from '../utils/index.js';
import {
  HANDOFF_BUCKETS,
  findBucket,
  mapBuckets,
  planClaim,
  planComplete,
  stateOfBucket,
} from './handoff-state.js';
import { descriptionMarkers, normalizeSessionId, sameClaim, type MarkerCodec } from './markers.js';

export interface HandoffQueueOptions {
  resolver: InstanceResolver;
  clientFactory: RemoteClientFactory;
  sessionId: string;
  now?: () => Date;
  markers?: MarkerCodec;
}

export interface CompleteOptions {
  instance?: string;
  notes?: string;
}

interface QueueContext {
  project: HandoffProjectRef;
  client: RemoteTaskClient;
}

export class HandoffQueue {
  readonly sessionId: string;
  private readonly resolver: InstanceResolver;
  private readonly clientFactory: RemoteClientFactory;
  private readonly now: () => Date;
  private readonly markers: MarkerCodec;

  constructor(options: HandoffQueueOptions) {
    this.resolver = options.resolver;
    this.clientFactory = options.clientFactory;
    this.sessionId = normalizeSessionId(options.sessionId);
    this.now = options.now ?? (() => new Date());
    this.markers = options.markers ?? descriptionMarkers;
  }

  /**
   * Items waiting in the Handoff bucket, in Vikunja's bucket order
   */
  async check(instance?: string): Promise<HandoffItem[]> {
    const ctx = this.connect('check', instance);
    const buckets = await this.remote('check', () => ctx.client.listBuckets(ctx.project.projectId));
    const ids = mapBuckets(buckets);

    if (ids.handoff === undefined) {
      throw this.missingBucket('check', ctx, 'Handoff');
    }

    const handoffId = ids.handoff;
    const tasks = await this.remote('check', () =>
      ctx.client.listBucketTasks(ctx.project.projectId, handoffId)
    );

    logger.debug(`X-Q check: ${tasks.length} pending`, {
      instance: ctx.project.name,
      projectId: ctx.project.projectId,
    });

    return tasks.map((task) => this.toItem(task, ctx, ids));
  }

  /**
   * Create whichever of the three buckets are missing. Existing buckets are
   * matched by name before each create, so reruns never duplicate.
   */
  async setup(instance?: string): Promise<SetupResult> {
    const ctx = this.connect('setup', instance);
    const { projectId } = ctx.project;
    const ids: Partial<HandoffBucketIds> = {};
    const created: string[] = [];
    const existing: string[] = [];

    for (const bucketDef of HANDOFF_BUCKETS) {
      const buckets = await this.remote('setup', () => ctx.client.listBuckets(projectId));
      const found = findBucket(buckets, bucketDef);

      if (found) {
        ids[bucketDef.state] = found.id;
        existing.push(bucketDef.title);
        continue;
      }

      const bucket = await this.remote('setup', () =>
        ctx.client.createBucket(projectId, bucketDef.title)
      );
      ids[bucketDef.state] = bucket.id;
      created.push(bucketDef.title);
      logger.info(`X-Q bucket created: ${bucketDef.title}`, {
        instance: ctx.project.name,
        projectId,
        bucketId: bucket.id,
      });
    }

    const bucketIds = completeIds(ids);
    if (!bucketIds) {
      throw new HandoffError('setup', 'RemoteUnavailable', 'bucket creation did not return IDs');
    }

    return { instance: ctx.project.name, projectId, bucketIds, created, existing };
  }

  /**
   * Take a task out of Handoff into Review under this session's claim
   */
  async claim(taskId: number, instance?: string): Promise<HandoffItem> {
    const ctx = this.connect('claim', instance, taskId);
    const ids = await this.requireBuckets('claim', ctx, taskId);
    const before = await this.readTask('claim', ctx, taskId);

    const markers = this.markers.read(before.description);
    const plan = planClaim({
      state: stateOfBucket(before.bucketId, ids),
      claim: markers.claim,
      claimCount: markers.claimCount,
    });
    if (!plan.ok) {
      throw new HandoffError('claim', plan.kind, plan.reason, { taskId });
    }

    const claim: ClaimMarker = { by: this.sessionId, at: this.now().toISOString() };
    const description = this.markers.write({ body: markers.body, claim, filed: markers.filed });

    await this.remote(
      'claim',
      () => ctx.client.updateTask(taskId, { description, bucketId: ids[plan.next] }),
      { taskId }
    );

    // Verify: a competing claim written after ours replaces our marker
    const after = await this.readTask('claim', ctx, taskId);
    const afterMarkers = this.markers.read(after.description);

    if (!sameClaim(afterMarkers.claim, claim) || afterMarkers.claimCount !== 1) {
      logger.warn('X-Q claim lost', {
        taskId,
        session: this.sessionId,
        winner: afterMarkers.claim?.by ?? null,
      });
      throw new HandoffError(
        'claim',
        'LostRace',
        `claimed concurrently by ${afterMarkers.claim?.by ?? 'another session'}`,
        { taskId }
      );
    }

    const item = this.toItem(after, ctx, ids);
    if (item.state !== plan.next) {
      throw new HandoffError(
        'claim',
        'RemoteUnavailable',
        `claim marker written but task is ${item.state ?? 'outside the X-Q buckets'}, not review`,
        { taskId }
      );
    }

    logger.info(`X-Q task ${taskId} claimed`, { session: this.sessionId, instance: ctx.project.name });
    return item;
  }

  /**
   * Record where a claimed task went, release the claim and move it to Filed
   */
  async complete(
    taskId: number,
    destination: string,
    options: CompleteOptions = {}
  ): Promise<HandoffItem> {
    const ctx = this.connect('complete', options.instance, taskId);
    const ids = await this.requireBuckets('complete', ctx, taskId);
    const task = await this.readTask('complete', ctx, taskId);

    const markers = this.markers.read(task.description);
    const plan = planComplete(
      {
        state: stateOfBucket(task.bucketId, ids),
        claim: markers.claim,
        claimCount: markers.claimCount,
      },
      this.sessionId
    );
    if (!plan.ok) {
      throw new HandoffError('complete', plan.kind, plan.reason, { taskId });
    }

    const filed: FiledMarker = { to: destination, at: this.now().toISOString() };
    if (options.notes) {
      filed.notes = options.notes;
    }
    const description = this.markers.write({ body: markers.body, claim: null, filed });

    await this.remote(
      'complete',
      () =>
        ctx.client.updateTask(taskId, { description, done: true, bucketId: ids[plan.next] }),
      { taskId }
    );

    // Vikunja may override the move, e.g. through its own done-bucket handling
    const after = await this.readTask('complete', ctx, taskId);
    const item = this.toItem(after, ctx, ids);
    if (item.state !== plan.next) {
      logger.warn('X-Q complete did not reach Filed', { taskId, state: item.state });
      throw new HandoffError(
        'complete',
        'RemoteUnavailable',
        `task was written but is ${item.state ?? 'outside the X-Q buckets'}, not filed`,
        { taskId }
      );
    }

    logger.info(`X-Q task ${taskId} filed`, {
      session: this.sessionId,
      instance: ctx.project.name,
      destination,
    });
    return item;
  }

  private connect(operation: HandoffOperation, instance?: string, taskId?: number): QueueContext {
    try {
      const project = this.resolver.resolveHandoffProject(instance);
      return { project, client: this.clientFactory(project) };
    } catch (error) {
      throw toHandoffError(operation, error, { taskId });
    }
  }

  private async remote<T>(
    operation: HandoffOperation,
    call: () => Promise<T>,
    options: { taskId?: number; taskRead?: boolean } = {}
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw toHandoffError(operation, error, options);
    }
  }

  private async readTask(
    operation: HandoffOperation,
    ctx: QueueContext,
    taskId: number
  ): Promise<RemoteTask> {
    const task = await this.remote(operation, () => ctx.client.getTask(taskId), {
      taskId,
      taskRead: true,
    });

    if (task.projectId !== null && task.projectId !== ctx.project.projectId) {
      throw new HandoffError(
        operation,
        'TaskNotFound',
        `task belongs to project ${task.projectId}, not the X-Q project ${ctx.project.projectId}`,
        { taskId }
      );
    }
    return task;
  }

  private async requireBuckets(
    operation: HandoffOperation,
    ctx: QueueContext,
    taskId?: number
  ): Promise<HandoffBucketIds> {
    const buckets = await this.remote(operation, () => ctx.client.listBuckets(ctx.project.projectId), {
      taskId,
    });
    const ids = mapBuckets(buckets);
    const complete = completeIds(ids);

    if (!complete) {
      const missing = HANDOFF_BUCKETS.find((bucketDef) => ids[bucketDef.state] === undefined);
      throw this.missingBucket(operation, ctx, missing?.name ?? 'Handoff', taskId);
    }
    return complete;
  }

  private missingBucket(
    operation: HandoffOperation,
    ctx: QueueContext,
    name: string,
    taskId?: number
  ): HandoffError {
    return new HandoffError(
      operation,
      'NotConfigured',
      `no ${name} bucket in X-Q project ${ctx.project.projectId} on '${ctx.project.name}'. Run setup_xq first.`,
      { taskId }
    );
  }

  private toItem(task: RemoteTask, ctx: QueueContext, ids: Partial<HandoffBucketIds>): HandoffItem {
    const markers = this.markers.read(task.description);
    const state: HandoffState | null = stateOfBucket(task.bucketId, ids);

    return {
      id: task.id,
      title: task.title,
      description: markers.body,
      state,
      bucketId: task.bucketId,
      done: task.done,
      claim: markers.claim,
      filed: markers.filed,
      instance: ctx.project.name,
      projectId: ctx.project.projectId,
    };
  }
}

function completeIds(ids: Partial<HandoffBucketIds>): HandoffBucketIds | null {
  const { handoff, review, filed } = ids;
  if (handoff === undefined || review === undefined || filed === undefined) {
    return null;
  }
  return { handoff, review, filed };
}
