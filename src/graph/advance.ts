import type { NodeStatus, NodeTransition } from '../types/index.js';
import type { TaskGraph } from './store.js';
import { topologicalOrder } from './topology.js';

/**
 * Run one advancement tick.
 *
 * Nodes are visited once, in topological order:
 * - `in_progress` becomes `completed`
 * - `pending` becomes `in_progress` when every hard predecessor was
 *   `completed` at the start of the tick
 * - `completed` and `failed` are left alone
 *
 * Predecessor statuses are read from a snapshot taken before any write, so a
 * node completed in this tick does not release its successors until the next
 * one. Soft edges never gate.
 *
 * @returns transitions in visit order; empty when nothing was eligible
 * @throws CycleError before any status is touched if the graph has a cycle
 */
export function advance(graph: TaskGraph): NodeTransition[] {
  const order = topologicalOrder(graph);

  const snapshot = new Map<string, NodeStatus>();
  for (const node of graph.nodes) {
    snapshot.set(node.id, node.status);
  }

  const transitions: NodeTransition[] = [];

  for (const id of order) {
    const status = snapshot.get(id);

    if (status === 'in_progress') {
      transitions.push({ nodeId: id, from: status, to: 'completed' });
    } else if (status === 'pending' && isReleased(graph, id, snapshot)) {
      transitions.push({ nodeId: id, from: status, to: 'in_progress' });
    }
  }

  for (const transition of transitions) {
    graph.updateStatus(transition.nodeId, transition.to);
  }

  return transitions;
}

function isReleased(graph: TaskGraph, id: string, snapshot: Map<string, NodeStatus>): boolean {
  for (const predecessor of graph.getHardPredecessors(id)) {
    if (snapshot.get(predecessor) !== 'completed') return false;
  }
  return true;
}

/**
 * Pending nodes that can never start: some hard predecessor chain leads back
 * to a `failed` node. Returned in insertion order.
 */
export function findBlockedNodes(graph: TaskGraph): string[] {
  const blocked = new Set<string>();
  const queue = graph.nodes.filter((n) => n.status === 'failed').map((n) => n.id);

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;

    for (const successor of graph.getSuccessors(id)) {
      if (blocked.has(successor)) continue;
      if (!graph.getHardPredecessors(successor).has(id)) continue;
      if (graph.getNode(successor)?.status !== 'pending') continue;

      blocked.add(successor);
      queue.push(successor);
    }
  }

  return graph.nodeIds().filter((id) => blocked.has(id));
}
