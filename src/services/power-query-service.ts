/**
 * Power queries - canned read-only filters over open tasks across instances
 */

import type {
  FocusResult,
  InstanceResolver,
  QueryFailure,
  QueryResult,
  QueryTask,
  RemoteClientFactory,
  RemoteTask,
  TaskSummary,
} from '../types/index.js';
import { errorMessage, logger } from '../utils/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const HIGH_PRIORITY = 3;
const URGENT_PRIORITY = 4;

interface OpenTask extends RemoteTask {
  instance: string;
  projectTitle: string;
  due: Date | null;
}

interface Collected {
  tasks: OpenTask[];
  errors: QueryFailure[];
}

export function parseDueDate(value: string | null): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

export function endOfUtcDay(now: Date): Date {
  return new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 23, 59, 59)
  );
}

function toQueryTask(task: OpenTask): QueryTask {
  return {
    id: task.id,
    title: task.title,
    priority: task.priority,
    due_date: task.dueDate,
    project: task.projectTitle,
    instance: task.instance,
  };
}

function byDue(a: OpenTask, b: OpenTask): number {
  return (a.due?.getTime() ?? Infinity) - (b.due?.getTime() ?? Infinity);
}

function byPriority(a: OpenTask, b: OpenTask): number {
  return b.priority - a.priority;
}

function withErrors<T extends { errors?: QueryFailure[] }>(result: T, errors: QueryFailure[]): T {
  return errors.length > 0 ? { ...result, errors } : result;
}

export class PowerQueryService {
  constructor(
    private readonly resolver: InstanceResolver,
    private readonly clientFactory: RemoteClientFactory,
    private readonly now: () => Date = () => new Date()
  ) {}

  async overdue(instance?: string): Promise<QueryResult> {
    const now = this.now();
    const { tasks, errors } = await this.collect(instance);
    const matching = tasks.filter((t) => t.due !== null && t.due < now).sort(byDue);
    return this.result(matching, errors);
  }

  async dueToday(instance?: string): Promise<QueryResult> {
    const now = this.now();
    const todayEnd = endOfUtcDay(now);
    const { tasks, errors } = await this.collect(instance);

    const matching = tasks
      .filter((t) => t.due !== null && t.due <= todayEnd)
      .sort((a, b) => byPriority(a, b) || byDue(a, b));

    return withErrors<QueryResult>(
      {
        tasks: matching.map((t) => ({ ...toQueryTask(t), overdue: t.due !== null && t.due < now })),
        count: matching.length,
      },
      errors
    );
  }

  async dueThisWeek(instance?: string): Promise<QueryResult> {
    const weekEnd = new Date(this.now().getTime() + 7 * DAY_MS);
    const { tasks, errors } = await this.collect(instance);
    const matching = tasks.filter((t) => t.due !== null && t.due <= weekEnd).sort(byDue);
    return this.result(matching, errors);
  }

  async highPriority(instance?: string): Promise<QueryResult> {
    const { tasks, errors } = await this.collect(instance);
    const matching = tasks.filter((t) => t.priority >= HIGH_PRIORITY).sort(byPriority);
    return this.result(matching, errors);
  }

  async urgent(instance?: string): Promise<QueryResult> {
    const { tasks, errors } = await this.collect(instance);
    const matching = tasks.filter((t) => t.priority >= URGENT_PRIORITY).sort(byPriority);
    return this.result(matching, errors);
  }

  /**
   * Urgent or overdue, most important first. limit 0 returns everything.
   */
  async focusNow(instance?: string, limit = 10): Promise<FocusResult> {
    const now = this.now();
    const { tasks, errors } = await this.collect(instance);

    const matching = tasks
      .filter((t) => t.priority >= URGENT_PRIORITY || (t.due !== null && t.due < now))
      .sort((a, b) => byPriority(a, b) || byDue(a, b));
    const shown = limit > 0 ? matching.slice(0, limit) : matching;

    return withErrors<FocusResult>(
      {
        tasks: shown.map((t) => ({ ...toQueryTask(t), overdue: t.due !== null && t.due < now })),
        count: shown.length,
        total_matching: matching.length,
      },
      errors
    );
  }

  async summary(instance?: string): Promise<TaskSummary> {
    const now = this.now();
    const todayEnd = endOfUtcDay(now);
    const weekEnd = new Date(now.getTime() + 7 * DAY_MS);
    const { tasks, errors } = await this.collect(instance);

    const counts: TaskSummary = {
      total: tasks.length,
      overdue: 0,
      due_today: 0,
      due_this_week: 0,
      high_priority: 0,
      urgent: 0,
      unscheduled: 0,
    };

    for (const task of tasks) {
      if (task.due) {
        if (task.due < now) counts.overdue++;
        if (task.due <= todayEnd) counts.due_today++;
        if (task.due <= weekEnd) counts.due_this_week++;
      } else {
        counts.unscheduled++;
      }

      if (task.priority >= HIGH_PRIORITY) counts.high_priority++;
      if (task.priority >= URGENT_PRIORITY) counts.urgent++;
    }

    return withErrors(counts, errors);
  }

  async unscheduled(instance?: string): Promise<QueryResult> {
    const { tasks, errors } = await this.collect(instance);
    return this.result(
      tasks.filter((t) => t.due === null),
      errors
    );
  }

  /**
   * Due between now and now + days; overdue tasks are left out
   */
  async upcomingDeadlines(days = 3, instance?: string): Promise<QueryResult> {
    const now = this.now();
    const horizon = new Date(now.getTime() + days * DAY_MS);
    const { tasks, errors } = await this.collect(instance);

    const matching = tasks
      .filter((t) => t.due !== null && t.due >= now && t.due <= horizon)
      .sort(byDue);
    return this.result(matching, errors);
  }

  private result(tasks: OpenTask[], errors: QueryFailure[]): QueryResult {
    return withErrors<QueryResult>({ tasks: tasks.map(toQueryTask), count: tasks.length }, errors);
  }

  /**
   * Open tasks of every project, from one instance or all of them.
   * A failing instance or project is reported in `errors`; the rest still answer.
   */
  private async collect(instance?: string): Promise<Collected> {
    const names = instance ? [instance] : this.resolver.listInstances();
    const collected: Collected = { tasks: [], errors: [] };

    for (const name of names) {
      try {
        const client = this.clientFactory(this.resolver.getInstance(name));
        const projects = await client.listProjects();

        const results = await Promise.allSettled(
          projects.map(async (project) => {
            const tasks = await client.listProjectTasks(project.id);
            return tasks
              .filter((t) => !t.done)
              .map((t) => ({
                ...t,
                instance: name,
                projectTitle: project.title,
                due: parseDueDate(t.dueDate),
              }));
          })
        );

        results.forEach((result, index) => {
          if (result.status === 'fulfilled') {
            collected.tasks.push(...result.value);
          } else {
            collected.errors.push({
              instance: name,
              error: `project ${projects[index].id}: ${errorMessage(result.reason)}`,
            });
          }
        });
      } catch (error) {
        logger.warn(`Task query against ${name} failed`, { error: errorMessage(error) });
        collected.errors.push({ instance: name, error: errorMessage(error) });
      }
    }

    return collected;
  }
}
