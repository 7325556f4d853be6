import assert from 'node:assert';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { closeDatabase } from '../db/index.js';
import { CycleError, NodeReferenceError, TaskGraph } from '../graph/index.js';
import { initializeSession, loadSession, saveSession } from '../state/index.js';
import type { Session } from '../types/index.js';
import { createMCPServer, executeTool } from './server.js';

function twoTaskSession(stateDir: string): { session: Session; a: string; b: string } {
  const graph = new TaskGraph();
  const a = graph.addNode('Prepare');
  const b = graph.addNode('Publish');
  graph.addEdge(a, b);
  return {
    session: initializeSession({ goal: 'Release', effort: 'low', stateDir, graph }),
    a,
    b,
  };
}

function textOf(result: unknown): string {
  const parsed = CallToolResultSchema.parse(result);
  return parsed.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
}

describe('executeTool', () => {
  test('add_task adds a pending node', () => {
    const { session } = twoTaskSession('.taskdag');

    const text = executeTool(session, 'add_task', { description: 'Announce' });

    const added = session.graph.nodes[2];
    assert.strictEqual(text, `Task ${added.id} created`);
    assert.strictEqual(added.description, 'Announce');
    assert.strictEqual(added.status, 'pending');
  });

  test('add_dependency warns about a cycle it closes', () => {
    const { session, a, b } = twoTaskSession('.taskdag');

    const text = executeTool(session, 'add_dependency', { source: b, target: a });

    assert.strictEqual(
      text,
      `Dependency ${b} -> ${a} (hard) added. Warning: this closes the cycle ${a} -> ${b} -> ${a}; advance will fail until a dependency on it is removed`
    );
    assert.throws(() => executeTool(session, 'advance', {}), CycleError);
  });

  test('advance reports the tick and transitions', () => {
    const { session, a } = twoTaskSession('.taskdag');

    assert.strictEqual(
      executeTool(session, 'advance', {}),
      `Tick 1: 1 transitions\n${a}: pending -> in_progress`
    );
  });

  test('set_task_status, remove_dependency and remove_task', () => {
    const { session, a, b } = twoTaskSession('.taskdag');

    assert.strictEqual(
      executeTool(session, 'set_task_status', { taskId: a, status: 'failed' }),
      `Task ${a}: pending -> failed`
    );
    assert.strictEqual(
      executeTool(session, 'remove_dependency', { source: a, target: b }),
      `Removed 1 dependencies from ${a} to ${b}`
    );
    assert.strictEqual(executeTool(session, 'remove_task', { taskId: a }), `Task ${a} removed`);
    assert.deepStrictEqual(session.graph.nodeIds(), [b]);
  });

  test('unknown node ids raise NodeReferenceError', () => {
    const { session } = twoTaskSession('.taskdag');
    assert.throws(
      () => executeTool(session, 'remove_task', { taskId: 'missing' }),
      NodeReferenceError
    );
  });

  test('unknown tools are rejected', () => {
    const { session } = twoTaskSession('.taskdag');
    assert.throws(() => executeTool(session, 'write_task', {}), /Unknown tool: write_task/);
  });
});

describe('MCP Server', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'taskdag-mcp-test-'));
  });

  afterEach(async () => {
    closeDatabase();
    await rm(tempDir, { recursive: true });
  });

  async function connect(sessionId: string): Promise<Client> {
    const server = createMCPServer(tempDir, sessionId);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    return client;
  }

  test('lists every graph tool', async () => {
    const { session } = twoTaskSession(tempDir);
    saveSession(session);
    const client = await connect(session.sessionId);

    const { tools } = await client.listTools();
    assert.deepStrictEqual(
      tools.map((tool) => tool.name),
      [
        'add_task',
        'add_dependency',
        'remove_dependency',
        'remove_task',
        'set_task_status',
        'advance',
        'get_graph',
      ]
    );
    await client.close();
  });

  test('tool calls persist the session', async () => {
    const { session, a } = twoTaskSession(tempDir);
    saveSession(session);
    const client = await connect(session.sessionId);

    const result = await client.callTool({ name: 'advance', arguments: {} });
    assert.strictEqual(textOf(result), `Tick 1: 1 transitions\n${a}: pending -> in_progress`);

    const reloaded = loadSession(tempDir, session.sessionId);
    assert.strictEqual(reloaded?.tick, 1);
    assert.strictEqual(reloaded?.graph.getNode(a)?.status, 'in_progress');
    await client.close();
  });

  test('errors come back as isError results', async () => {
    const { session } = twoTaskSession(tempDir);
    saveSession(session);
    const client = await connect(session.sessionId);

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'remove_task', arguments: { taskId: 'missing' } })
    );
    assert.strictEqual(result.isError, true);
    assert.strictEqual(textOf(result), "Error in remove_task: Node missing doesn't exist");
    await client.close();
  });

  test('a missing session is reported as a tool error', async () => {
    const client = await connect('no-such-session');

    const result = CallToolResultSchema.parse(await client.callTool({ name: 'get_graph' }));
    assert.strictEqual(result.isError, true);
    assert.strictEqual(
      textOf(result),
      `Error in get_graph: Session no-such-session not found in ${tempDir}`
    );
    await client.close();
  });
});
