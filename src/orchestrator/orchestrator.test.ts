import assert from 'node:assert';
import { describe, test } from 'node:test';
import { CycleError, NodeReferenceError, TaskGraph } from '../graph/index.js';
import type { NodeTransition, Session } from '../types/index.js';
import {
  addDependency,
  addTask,
  advanceSession,
  getExitCode,
  getGraphOutcome,
  removeDependency,
  removeTask,
  runUntilSettled,
  setTaskStatus,
} from './index.js';

// Helper to create a minimal session for testing
function createTestSession(graph = new TaskGraph()): Session {
  return {
    sessionId: 'test-session',
    goal: 'Test goal',
    effort: 'medium',
    tick: 0,
    graph,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    stateDir: '.taskdag',
  };
}

function chain(): { session: Session; a: string; b: string } {
  const graph = new TaskGraph();
  const a = graph.addNode('A');
  const b = graph.addNode('B');
  graph.addEdge(a, b);
  return { session: createTestSession(graph), a, b };
}

describe('advanceSession', () => {
  test('increments the tick and reports transitions', () => {
    const { session, a } = chain();
    const seen: Array<{ tick: number; transitions: NodeTransition[] }> = [];

    const transitions = advanceSession(session, {
      onTick: (tick, t) => seen.push({ tick, transitions: t }),
    });

    assert.strictEqual(session.tick, 1);
    assert.deepStrictEqual(transitions, [{ nodeId: a, from: 'pending', to: 'in_progress' }]);
    assert.deepStrictEqual(seen, [{ tick: 1, transitions }]);
  });

  test('a cyclic graph leaves the tick unchanged', () => {
    const { session, a, b } = chain();
    session.graph.addEdge(b, a);

    assert.throws(() => advanceSession(session), CycleError);
    assert.strictEqual(session.tick, 0);
  });
});

describe('runUntilSettled', () => {
  test('runs the two-node chain to completion', () => {
    const { session } = chain();

    const result = runUntilSettled(session, { maxTicks: 10 });

    // A starts, A completes, B starts, B completes, then one empty tick
    assert.strictEqual(result.ticks, 5);
    assert.strictEqual(result.settled, true);
    assert.strictEqual(result.transitions.length, 4);
    assert.strictEqual(session.tick, 5);
    assert.strictEqual(getGraphOutcome(session.graph), 'completed');
  });

  test('stops at maxTicks without settling', () => {
    const { session } = chain();

    const result = runUntilSettled(session, { maxTicks: 2 });

    assert.strictEqual(result.ticks, 2);
    assert.strictEqual(result.settled, false);
    assert.strictEqual(getGraphOutcome(session.graph), 'running');
  });

  test('settles with a failed prerequisite', () => {
    const { session, a, b } = chain();
    setTaskStatus(session, a, 'failed');

    const result = runUntilSettled(session, { maxTicks: 10 });

    assert.strictEqual(result.ticks, 1);
    assert.strictEqual(result.settled, true);
    assert.strictEqual(session.graph.getNode(b)?.status, 'pending');
    assert.strictEqual(getExitCode(session.graph), 2);
  });
});

describe('getExitCode', () => {
  test('returns 0 for a completed or empty graph', () => {
    const graph = new TaskGraph();
    assert.strictEqual(getExitCode(graph), 0);

    graph.updateStatus(graph.addNode('done'), 'completed');
    assert.strictEqual(getExitCode(graph), 0);
  });

  test('returns 0 while work remains', () => {
    const graph = new TaskGraph();
    graph.addNode('todo');
    assert.strictEqual(getGraphOutcome(graph), 'running');
    assert.strictEqual(getExitCode(graph), 0);
  });

  test('returns 2 once a task failed', () => {
    const graph = new TaskGraph();
    graph.updateStatus(graph.addNode('broken'), 'failed');
    assert.strictEqual(getExitCode(graph), 2);
  });
});

describe('manual edits', () => {
  test('addTask and removeTask', () => {
    const session = createTestSession();
    const id = addTask(session, 'Write tests');

    assert.strictEqual(session.graph.getNode(id)?.description, 'Write tests');
    removeTask(session, id);
    assert.strictEqual(session.graph.size, 0);
  });

  test('addDependency reports a cycle it closes', () => {
    const { session, a, b } = chain();

    assert.strictEqual(addDependency(session, a, b, 'soft'), null);
    assert.deepStrictEqual(addDependency(session, b, a), [a, b, a]);
  });

  test('removeDependency returns how many edges went away', () => {
    const { session, a, b } = chain();
    session.graph.addEdge(a, b, 'soft');

    assert.strictEqual(removeDependency(session, a, b), 2);
    assert.strictEqual(removeDependency(session, a, b), 0);
  });

  test('setTaskStatus returns the manual transition', () => {
    const { session, a } = chain();

    assert.deepStrictEqual(setTaskStatus(session, a, 'completed'), {
      nodeId: a,
      from: 'pending',
      to: 'completed',
    });
    assert.throws(() => setTaskStatus(session, 'missing', 'failed'), NodeReferenceError);
  });
});
