import {
  findBlockedNodes,
  findCycle,
  longestPath,
  topologicalLayers,
} from '../graph/index.js';
import type { TaskGraph } from '../graph/index.js';
import { NODE_STATUSES, type NodeStatus, type Session } from '../types/index.js';

export function countByStatus(graph: TaskGraph): Record<NodeStatus, number> {
  const counts: Record<NodeStatus, number> = {
    pending: 0,
    in_progress: 0,
    completed: 0,
    failed: 0,
  };
  for (const node of graph.nodes) {
    counts[node.status]++;
  }
  return counts;
}

function describeNode(graph: TaskGraph, id: string): string {
  const node = graph.getNode(id);
  return node ? `[${id}] ${node.description} (${node.status})` : `[${id}]`;
}

/**
 * Human-readable session summary: status counts, DAG check, execution layers,
 * roots and leaves, longest chain and blocked tasks.
 */
export function formatGraphSummary(session: Session): string {
  const { graph } = session;
  const lines: string[] = [];

  lines.push(`Goal: ${session.goal}`);
  lines.push(`Session: ${session.sessionId} (tick ${session.tick}, effort ${session.effort})`);

  const counts = countByStatus(graph);
  const breakdown = NODE_STATUSES.map((status) => `${status} ${counts[status]}`).join(', ');
  lines.push(`Tasks: ${graph.size} (${breakdown})`);

  if (graph.size === 0) {
    lines.push('No tasks.');
    return lines.join('\n');
  }

  const cycle = findCycle(graph);
  if (cycle) {
    lines.push(`DAG: no, cycle ${cycle.join(' -> ')}`);
    return lines.join('\n');
  }
  lines.push('DAG: yes');

  lines.push('', 'Execution layers:');
  topologicalLayers(graph).forEach((layer, i) => {
    lines.push(`  Layer ${i + 1}${layer.length > 1 ? ' (parallel)' : ''}:`);
    for (const id of layer) {
      lines.push(`    ${describeNode(graph, id)}`);
    }
  });

  lines.push('');
  lines.push(`Roots: ${graph.getRootNodes().join(', ')}`);
  lines.push(`Leaves: ${graph.getLeafNodes().join(', ')}`);

  const chain = longestPath(graph);
  lines.push(`Longest chain (${chain.length} tasks): ${chain.join(' -> ')}`);

  const blocked = findBlockedNodes(graph);
  lines.push(`Blocked: ${blocked.length > 0 ? blocked.join(', ') : 'none'}`);

  return lines.join('\n');
}
