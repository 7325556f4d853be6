import assert from 'node:assert';
import { describe, test } from 'node:test';
import type { NodeStatus } from '../types/index.js';
import { advance, findBlockedNodes } from './advance.js';
import { CycleError } from './errors.js';
import { TaskGraph } from './store.js';

function statuses(graph: TaskGraph): Record<string, NodeStatus> {
  return Object.fromEntries(graph.nodes.map((n) => [n.id, n.status]));
}

function graphOf(ids: string[]): TaskGraph {
  const graph = new TaskGraph();
  for (const id of ids) {
    graph.restoreNode({ id, description: id, status: 'pending', inputs: null, outputs: null });
  }
  return graph;
}

describe('advance', () => {
  test('moves a hard chain forward one level per tick', () => {
    const graph = graphOf(['A', 'B']);
    graph.addEdge('A', 'B');

    assert.deepStrictEqual(advance(graph), [{ nodeId: 'A', from: 'pending', to: 'in_progress' }]);
    assert.deepStrictEqual(statuses(graph), { A: 'in_progress', B: 'pending' });

    // B still sees A as in_progress from the start of the tick
    assert.deepStrictEqual(advance(graph), [{ nodeId: 'A', from: 'in_progress', to: 'completed' }]);
    assert.deepStrictEqual(statuses(graph), { A: 'completed', B: 'pending' });

    assert.deepStrictEqual(advance(graph), [{ nodeId: 'B', from: 'pending', to: 'in_progress' }]);
    assert.deepStrictEqual(advance(graph), [{ nodeId: 'B', from: 'in_progress', to: 'completed' }]);
    assert.deepStrictEqual(statuses(graph), { A: 'completed', B: 'completed' });
  });

  test('settled graphs produce no transitions', () => {
    const graph = graphOf(['A']);
    graph.updateStatus('A', 'completed');

    assert.deepStrictEqual(advance(graph), []);
    assert.deepStrictEqual(advance(graph), []);
    assert.deepStrictEqual(statuses(graph), { A: 'completed' });
  });

  test('the diamond join waits for both branches', () => {
    const graph = graphOf(['A', 'B', 'C', 'D']);
    graph.addEdge('A', 'B');
    graph.addEdge('A', 'C');
    graph.addEdge('B', 'D');
    graph.addEdge('C', 'D');

    advance(graph);
    advance(graph);
    assert.deepStrictEqual(advance(graph), [
      { nodeId: 'B', from: 'pending', to: 'in_progress' },
      { nodeId: 'C', from: 'pending', to: 'in_progress' },
    ]);

    graph.updateStatus('C', 'pending');
    advance(graph);
    assert.deepStrictEqual(statuses(graph), {
      A: 'completed',
      B: 'completed',
      C: 'in_progress',
      D: 'pending',
    });

    advance(graph);
    assert.strictEqual(graph.getNode('D')?.status, 'pending');
    assert.deepStrictEqual(advance(graph), [{ nodeId: 'D', from: 'pending', to: 'in_progress' }]);
  });

  test('soft edges never gate', () => {
    const graph = graphOf(['A', 'B']);
    graph.addEdge('A', 'B', 'soft');

    assert.deepStrictEqual(advance(graph), [
      { nodeId: 'A', from: 'pending', to: 'in_progress' },
      { nodeId: 'B', from: 'pending', to: 'in_progress' },
    ]);
  });

  test('a hard edge gates even alongside a soft one', () => {
    const graph = graphOf(['A', 'B']);
    graph.addEdge('A', 'B', 'soft');
    graph.addEdge('A', 'B', 'hard');

    assert.deepStrictEqual(advance(graph), [{ nodeId: 'A', from: 'pending', to: 'in_progress' }]);
  });

  test('failed predecessors block dependents forever', () => {
    const graph = graphOf(['A', 'B']);
    graph.addEdge('A', 'B');
    graph.updateStatus('A', 'failed');

    assert.deepStrictEqual(advance(graph), []);
    assert.deepStrictEqual(statuses(graph), { A: 'failed', B: 'pending' });
  });

  test('a cycle raises before any status changes', () => {
    const graph = graphOf(['ready', 'a', 'b', 'c']);
    graph.addEdge('a', 'b');
    graph.addEdge('b', 'c');
    graph.addEdge('c', 'a');

    assert.throws(() => advance(graph), CycleError);
    assert.deepStrictEqual(statuses(graph), {
      ready: 'pending',
      a: 'pending',
      b: 'pending',
      c: 'pending',
    });
  });

  test('empty graph advances to nothing', () => {
    assert.deepStrictEqual(advance(new TaskGraph()), []);
  });
});

describe('findBlockedNodes', () => {
  test('follows hard edges downstream of a failure', () => {
    const graph = graphOf(['A', 'B', 'C', 'D', 'E']);
    graph.addEdge('A', 'B');
    graph.addEdge('B', 'C');
    graph.addEdge('A', 'D', 'soft');
    graph.addEdge('E', 'C');
    graph.updateStatus('A', 'failed');

    assert.deepStrictEqual(findBlockedNodes(graph), ['B', 'C']);
  });

  test('only pending nodes are blocked', () => {
    const graph = graphOf(['A', 'B']);
    graph.addEdge('A', 'B');
    graph.updateStatus('A', 'failed');
    graph.updateStatus('B', 'completed');

    assert.deepStrictEqual(findBlockedNodes(graph), []);
  });
});
