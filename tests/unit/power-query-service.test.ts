/**
 * Power query tests
 * Clock fixed at 2025-03-12T10:00:00Z
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { endOfUtcDay, parseDueDate } from '../../src/services/power-query-service.js';
import { VikunjaApiError } from '../../src/utils/index.js';
import { FakeVikunja } from '../helpers/fake-vikunja.js';
import { FIXED_NOW, createTestClient, type TestClient } from '../helpers/test-client.js';

describe('PowerQueryService', () => {
  let client: TestClient;

  beforeEach(() => {
    client = createTestClient();
    const { fake } = client;
    fake.addProject(1, 'Inbox').addProject(2, 'Work');

    fake.addTask({ title: 'Pay rent', projectId: 1, dueDate: '2025-03-10T09:00:00Z', priority: 2 });
    fake.addTask({ title: 'Ship release', projectId: 2, dueDate: '2025-03-12T18:00:00Z', priority: 4 });
    fake.addTask({ title: 'Book flights', projectId: 1, dueDate: '2025-03-14T09:00:00Z', priority: 3 });
    fake.addTask({ title: 'Read book', projectId: 1, priority: 1 });
    fake.addTask({
      title: 'Old release',
      projectId: 2,
      dueDate: '2025-03-01T09:00:00Z',
      priority: 5,
      done: true,
    });
    fake.addTask({ title: 'Plan Q3', projectId: 2, dueDate: '2025-03-25T00:00:00Z' });
  });

  function titles(result: { tasks: Array<{ title: string }> }): string[] {
    return result.tasks.map((t) => t.title);
  }

  it('should list overdue tasks with their project and instance', async () => {
    const result = await client.queries.overdue();

    expect(result).toEqual({
      tasks: [
        {
          id: 1,
          title: 'Pay rent',
          priority: 2,
          due_date: '2025-03-10T09:00:00Z',
          project: 'Inbox',
          instance: 'personal',
        },
      ],
      count: 1,
    });
  });

  it('should list tasks due today, highest priority first, flagging overdue ones', async () => {
    const result = await client.queries.dueToday();

    expect(result.tasks.map((t) => [t.title, t.overdue])).toEqual([
      ['Ship release', false],
      ['Pay rent', true],
    ]);
  });

  it('should list tasks due within seven days by due date', async () => {
    expect(titles(await client.queries.dueThisWeek())).toEqual([
      'Pay rent',
      'Ship release',
      'Book flights',
    ]);
  });

  it('should filter by priority and skip done tasks', async () => {
    expect(titles(await client.queries.highPriority())).toEqual(['Ship release', 'Book flights']);
    expect(titles(await client.queries.urgent())).toEqual(['Ship release']);
  });

  it('should list unscheduled tasks', async () => {
    expect(titles(await client.queries.unscheduled())).toEqual(['Read book']);
  });

  it('should list upcoming deadlines without overdue tasks', async () => {
    expect(titles(await client.queries.upcomingDeadlines())).toEqual([
      'Ship release',
      'Book flights',
    ]);
    expect(titles(await client.queries.upcomingDeadlines(30))).toEqual([
      'Ship release',
      'Book flights',
      'Plan Q3',
    ]);
  });

  it('should put urgent and overdue tasks in focus with a limit', async () => {
    const all = await client.queries.focusNow();
    expect(titles(all)).toEqual(['Ship release', 'Pay rent']);
    expect(all.total_matching).toBe(2);

    const limited = await client.queries.focusNow(undefined, 1);
    expect(limited).toMatchObject({ count: 1, total_matching: 2 });
    expect(titles(limited)).toEqual(['Ship release']);
  });

  it('should count open tasks by category', async () => {
    expect(await client.queries.summary()).toEqual({
      total: 5,
      overdue: 1,
      due_today: 2,
      due_this_week: 3,
      high_priority: 2,
      urgent: 1,
      unscheduled: 1,
    });
  });

  describe('multiple instances', () => {
    let work: FakeVikunja;

    beforeEach(() => {
      work = new FakeVikunja().addProject(5, 'Sprint');
      work.addTask({ title: 'Fix login', projectId: 5, dueDate: '2025-03-11T09:00:00Z', priority: 4 });
      client = createTestClient({ instances: { work: { fake: work } } });
      client.fake.addProject(1, 'Inbox');
      client.fake.addTask({ title: 'Pay rent', projectId: 1, dueDate: '2025-03-10T09:00:00Z' });
    });

    it('should query every instance by default', async () => {
      const result = await client.queries.overdue();

      expect(result.tasks.map((t) => [t.title, t.instance])).toEqual([
        ['Pay rent', 'personal'],
        ['Fix login', 'work'],
      ]);
    });

    it('should restrict to one instance when asked', async () => {
      expect(titles(await client.queries.overdue('work'))).toEqual(['Fix login']);
    });

    it('should report a failing instance and keep the others', async () => {
      work.failOn('listProjects', new VikunjaApiError(401, 'Invalid token'));

      const result = await client.queries.overdue();

      expect(titles(result)).toEqual(['Pay rent']);
      expect(result.errors).toEqual([
        { instance: 'work', error: 'Vikunja API error (401): Invalid token' },
      ]);
    });

    it('should report a failing project and keep its siblings', async () => {
      work.addProject(6, 'Backlog');
      work.failProject(6, new Error('timeout'));

      const summary = await client.queries.summary('work');

      expect(summary).toEqual({
        total: 1,
        overdue: 1,
        due_today: 1,
        due_this_week: 1,
        high_priority: 1,
        urgent: 1,
        unscheduled: 0,
        errors: [{ instance: 'work', error: 'project 6: timeout' }],
      });
    });
  });
});

describe('date helpers', () => {
  it('should parse due dates and reject garbage', () => {
    expect(parseDueDate('2025-03-10T09:00:00Z')?.toISOString()).toBe('2025-03-10T09:00:00.000Z');
    expect(parseDueDate('not a date')).toBeNull();
    expect(parseDueDate(null)).toBeNull();
  });

  it('should end the day at 23:59:59 UTC', () => {
    expect(endOfUtcDay(FIXED_NOW).toISOString()).toBe('2025-03-12T23:59:59.000Z');
  });
});
