/**
 * MCP tool surface integration tests
 * Client and server talk over the SDK's in-memory transport
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createMcpServer } from '../../src/server/mcp-server.js';
import {
  FIXED_NOW,
  XQ_PROJECT_ID,
  createTestClient,
  seedBuckets,
  type TestClient,
} from '../helpers/test-client.js';

const NOW = FIXED_NOW.toISOString();

interface ToolResponse {
  isError: boolean;
  text: string;
}

describe('MCP tools', () => {
  let testClient: TestClient;
  let mcp: Client;

  async function connect(context: TestClient): Promise<Client> {
    const server = createMcpServer(context.queue, context.queries);
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    return client;
  }

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
    const result = CallToolResultSchema.parse(await mcp.callTool({ name, arguments: args }));
    const [first] = result.content;
    if (!first || first.type !== 'text') {
      throw new Error(`expected text content from ${name}`);
    }
    return { isError: result.isError ?? false, text: first.text };
  }

  beforeEach(async () => {
    testClient = createTestClient();
    mcp = await connect(testClient);
  });

  afterEach(async () => {
    await mcp.close();
  });

  it('should warn in the instructions that HTTP clients share one claim identity', () => {
    expect(mcp.getInstructions()).toContain('Over HTTP every client\nshares one X-Q session');
  });

  it('should list the X-Q and query tools', async () => {
    const { tools } = await mcp.listTools();

    expect(tools.map((t) => t.name)).toEqual([
      'check_xq',
      'setup_xq',
      'claim_xq_task',
      'complete_xq_task',
      'overdue_tasks',
      'due_today',
      'due_this_week',
      'high_priority_tasks',
      'urgent_tasks',
      'unscheduled_tasks',
      'task_summary',
      'focus_now',
      'upcoming_deadlines',
    ]);
  });

  it('should describe tool arguments as JSON schema', async () => {
    const { tools } = await mcp.listTools();
    const complete = tools.find((t) => t.name === 'complete_xq_task');

    expect(complete?.inputSchema).toEqual({
      type: 'object',
      properties: {
        instance: {
          type: 'string',
          description: 'Instance name (empty = configured default instance)',
        },
        task_id: { type: 'integer', exclusiveMinimum: 0, description: 'Task ID' },
        destination: {
          type: 'string',
          description: 'Where the work was filed (project/task reference)',
        },
        notes: { type: 'string', description: 'Optional notes recorded with the filing' },
      },
      required: ['task_id', 'destination'],
    });
  });

  it('should run the handoff from setup to filed', async () => {
    const setup = await call('setup_xq', { instance: 'personal' });
    expect(setup.isError).toBe(false);
    expect(JSON.parse(setup.text)).toMatchObject({
      created: ['📬 Handoff', '🔍 Review', '✅ Filed'],
      bucketIds: { handoff: 100, review: 101, filed: 102 },
    });

    const task = testClient.fake.addTask({
      title: 'Write report',
      bucketId: 100,
      projectId: XQ_PROJECT_ID,
    });

    const check = JSON.parse((await call('check_xq')).text);
    expect(check.count).toBe(1);
    expect(check.pending[0]).toMatchObject({ id: task.id, title: 'Write report', state: 'handoff' });

    const claim = JSON.parse((await call('claim_xq_task', { instance: 'personal', task_id: task.id })).text);
    expect(claim).toMatchObject({
      claimed: task.id,
      session: 'sessionA',
      item: { state: 'review', claim: { by: 'sessionA', at: NOW } },
    });

    const complete = JSON.parse(
      (
        await call('complete_xq_task', {
          instance: 'personal',
          task_id: task.id,
          destination: 'filed to work/Sprint42',
        })
      ).text
    );
    expect(complete).toMatchObject({
      filed: task.id,
      destination: 'filed to work/Sprint42',
      item: { state: 'filed', done: true, claim: null, filed: { to: 'filed to work/Sprint42' } },
    });

    expect(JSON.parse((await call('check_xq')).text)).toEqual({ count: 0, pending: [] });
  });

  it('should report the error kind when a claim is refused', async () => {
    const buckets = seedBuckets(testClient.fake);
    const task = testClient.fake.addTask({
      title: 'Write report',
      bucketId: buckets.review,
      projectId: XQ_PROJECT_ID,
    });

    const response = await call('claim_xq_task', { task_id: task.id });

    expect(response.isError).toBe(true);
    expect(JSON.parse(response.text)).toEqual({
      error: `Error claiming X-Q task: claim failed for task ${task.id}: [AlreadyClaimed] task is in review, not waiting in handoff`,
      kind: 'AlreadyClaimed',
      operation: 'claim',
      task_id: task.id,
    });
  });

  it('should fail check_xq with NotConfigured when no X-Q project is mapped', async () => {
    await mcp.close();
    mcp = await connect(createTestClient({ xqProjectId: null }));

    const response = await call('check_xq');

    expect(response.isError).toBe(true);
    expect(JSON.parse(response.text)).toEqual({
      error: "Error checking X-Q: check failed: [NotConfigured] X-Q not configured for 'personal'",
      kind: 'NotConfigured',
      operation: 'check',
    });
  });

  it('should answer power queries', async () => {
    testClient.fake.addProject(1, 'Inbox');
    testClient.fake.addTask({ title: 'Read book', projectId: 1 });

    const response = await call('task_summary');

    expect(JSON.parse(response.text)).toEqual({
      total: 1,
      overdue: 0,
      due_today: 0,
      due_this_week: 0,
      high_priority: 0,
      urgent: 0,
      unscheduled: 1,
    });
  });

  it('should reject invalid arguments', async () => {
    const response = await call('claim_xq_task', { task_id: -1 });

    expect(response.isError).toBe(true);
    expect(response.text.startsWith('Error calling tool claim_xq_task:')).toBe(true);
  });

  it('should reject unknown tools', async () => {
    expect(await call('delete_everything')).toEqual({
      isError: true,
      text: 'Unknown tool: delete_everything',
    });
  });
});
