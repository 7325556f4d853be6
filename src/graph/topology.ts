/**
 * Topology analysis over a TaskGraph.
 *
 * Hard and soft edges both count toward cycles and ordering; only the
 * advancement engine distinguishes them.
 *
 * Ordering uses Kahn's algorithm: among ready nodes, the one inserted into the
 * graph earliest is emitted next. Layers group nodes by depth instead, keeping
 * insertion order within a layer. Every result here is deterministic for a
 * fixed graph.
 */

import { CycleError } from './errors.js';
import type { TaskGraph } from './store.js';

type Colour = 'white' | 'grey' | 'black';

/**
 * Find one directed cycle using DFS with three-colour marking.
 * Returns the cycle as a path whose first and last ids are equal, or null.
 */
export function findCycle(graph: TaskGraph): string[] | null {
  const colour = new Map<string, Colour>();
  for (const id of graph.nodeIds()) {
    colour.set(id, 'white');
  }

  // Iterative DFS: each frame holds the node and its remaining successors
  for (const start of graph.nodeIds()) {
    if (colour.get(start) !== 'white') continue;

    const path: string[] = [start];
    const pending: string[][] = [[...graph.getSuccessors(start)]];
    colour.set(start, 'grey');

    while (path.length > 0) {
      const frame = pending[pending.length - 1];
      const next = frame.shift();

      if (next === undefined) {
        const done = path.pop();
        pending.pop();
        if (done !== undefined) colour.set(done, 'black');
        continue;
      }

      const state = colour.get(next);
      if (state === 'grey') {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (state === 'white') {
        colour.set(next, 'grey');
        path.push(next);
        pending.push([...graph.getSuccessors(next)]);
      }
    }
  }

  return null;
}

export function isDag(graph: TaskGraph): boolean {
  return findCycle(graph) === null;
}

/**
 * Throw CycleError carrying the offending path if the graph has a cycle.
 */
export function assertAcyclic(graph: TaskGraph): void {
  const cycle = findCycle(graph);
  if (cycle) {
    throw new CycleError(cycle);
  }
}

/**
 * Linear order in which every edge source precedes its target. Kahn's
 * algorithm with the ready set kept sorted by insertion position, so the
 * earliest-inserted ready node is always emitted next.
 * @throws CycleError if the graph is not a DAG
 */
export function topologicalOrder(graph: TaskGraph): string[] {
  const ids = graph.nodeIds();
  const position = new Map<string, number>();
  const inDegree = new Map<string, number>();
  ids.forEach((id, i) => {
    position.set(id, i);
    inDegree.set(id, graph.getPredecessors(id).size);
  });

  const rank = (id: string) => position.get(id) ?? 0;
  const ready = ids.filter((id) => inDegree.get(id) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);

    for (const successor of graph.getSuccessors(id)) {
      const remaining = (inDegree.get(successor) ?? 0) - 1;
      inDegree.set(successor, remaining);
      if (remaining === 0) {
        const at = ready.findIndex((other) => rank(other) > rank(successor));
        ready.splice(at === -1 ? ready.length : at, 0, successor);
      }
    }
  }

  if (order.length < ids.length) {
    throw new CycleError(findCycle(graph) ?? []);
  }

  return order;
}

/**
 * Kahn's layering: layer 0 holds the roots, and every other node sits one
 * layer below its deepest predecessor. Within a layer nodes keep insertion
 * order.
 *
 * @throws CycleError if the graph is not a DAG
 */
export function topologicalLayers(graph: TaskGraph): string[][] {
  const ids = graph.nodeIds();
  const inDegree = new Map<string, number>();
  for (const id of ids) {
    inDegree.set(id, graph.getPredecessors(id).size);
  }

  const layers: string[][] = [];
  let current = ids.filter((id) => inDegree.get(id) === 0);
  let emitted = 0;

  while (current.length > 0) {
    layers.push(current);
    emitted += current.length;

    const released = new Set<string>();
    for (const id of current) {
      for (const successor of graph.getSuccessors(id)) {
        const remaining = (inDegree.get(successor) ?? 0) - 1;
        inDegree.set(successor, remaining);
        if (remaining === 0) released.add(successor);
      }
    }

    current = ids.filter((id) => released.has(id));
  }

  if (emitted < ids.length) {
    throw new CycleError(findCycle(graph) ?? []);
  }

  return layers;
}

/**
 * Longest chain of dependent nodes, counted in nodes rather than durations.
 * Ties go to the chain ending at the earliest-inserted node.
 *
 * @throws CycleError if the graph is not a DAG
 */
export function longestPath(graph: TaskGraph): string[] {
  const order = topologicalOrder(graph);
  const length = new Map<string, number>();
  const via = new Map<string, string>();

  for (const id of order) {
    let best = 0;
    let bestPredecessor: string | undefined;
    // Scan predecessors in order position so ties resolve the same way each run
    const direct = graph.getPredecessors(id);
    const predecessors = order.filter((p) => direct.has(p));
    for (const predecessor of predecessors) {
      const candidate = length.get(predecessor) ?? 0;
      if (candidate > best) {
        best = candidate;
        bestPredecessor = predecessor;
      }
    }
    length.set(id, best + 1);
    if (bestPredecessor !== undefined) via.set(id, bestPredecessor);
  }

  let end: string | undefined;
  for (const id of graph.nodeIds()) {
    if (end === undefined || (length.get(id) ?? 0) > (length.get(end) ?? 0)) {
      end = id;
    }
  }

  const path: string[] = [];
  for (let cursor = end; cursor !== undefined; cursor = via.get(cursor)) {
    path.unshift(cursor);
  }
  return path;
}
