import type { DebugTracer } from '../debug/index.js';
import { NodeReferenceError, type TaskGraph, advance, findCycle } from '../graph/index.js';
import type { DependencyType, NodeStatus, NodeTransition, Session } from '../types/index.js';

export interface OrchestratorCallbacks {
  onTick?: (tick: number, transitions: NodeTransition[]) => void;
  tracer?: DebugTracer;
}

/**
 * Run one advancement tick on the session graph and bump its tick counter.
 * A CycleError propagates before anything changes, tick included.
 */
export function advanceSession(
  session: Session,
  callbacks: OrchestratorCallbacks = {}
): NodeTransition[] {
  const transitions = advance(session.graph);
  session.tick++;

  callbacks.tracer?.logTick(session.tick, transitions);
  for (const t of transitions) {
    callbacks.tracer?.logTaskStatusChange(t.nodeId, t.from, t.to, 'advance');
  }
  callbacks.onTick?.(session.tick, transitions);

  return transitions;
}

export interface RunOptions extends OrchestratorCallbacks {
  maxTicks: number;
}

export interface RunResult {
  ticks: number;
  transitions: NodeTransition[];
  // false when maxTicks ran out before a tick changed nothing
  settled: boolean;
}

/**
 * Tick until a tick produces no transitions or `maxTicks` ticks have run.
 * The final, empty tick counts toward `ticks`.
 */
export function runUntilSettled(session: Session, options: RunOptions): RunResult {
  const all: NodeTransition[] = [];

  for (let ticks = 1; ticks <= options.maxTicks; ticks++) {
    const transitions = advanceSession(session, options);
    if (transitions.length === 0) {
      return { ticks, transitions: all, settled: true };
    }
    all.push(...transitions);
  }

  return { ticks: options.maxTicks, transitions: all, settled: false };
}

export type GraphOutcome = 'completed' | 'stalled' | 'running';

/**
 * `completed` when every node is completed (an empty graph included),
 * `stalled` once any node has failed, since its hard dependents can never
 * start, and `running` otherwise.
 */
export function getGraphOutcome(graph: TaskGraph): GraphOutcome {
  const nodes = graph.nodes;
  if (nodes.every((n) => n.status === 'completed')) return 'completed';
  if (nodes.some((n) => n.status === 'failed')) return 'stalled';
  return 'running';
}

export function getExitCode(graph: TaskGraph): number {
  if (getGraphOutcome(graph) === 'stalled') return 2;
  return 0; // Completed, or more ticks to go
}

// Manual edits. Each validates through the store before anything is traced.

export function addTask(session: Session, description: string, tracer?: DebugTracer): string {
  const id = session.graph.addNode(description);
  tracer?.logGraphChange('add_task', { id, description });
  return id;
}

/**
 * Add a dependency edge. The store accepts edges that close a cycle; the
 * cycle is returned so the caller can report it, and advancing fails with
 * CycleError until an edge on it is removed.
 */
export function addDependency(
  session: Session,
  source: string,
  target: string,
  dependencyType: DependencyType = 'hard',
  tracer?: DebugTracer
): string[] | null {
  session.graph.addEdge(source, target, dependencyType);
  tracer?.logGraphChange('add_dependency', { source, target, dependencyType });
  return findCycle(session.graph);
}

export function removeDependency(
  session: Session,
  source: string,
  target: string,
  tracer?: DebugTracer
): number {
  const removed = session.graph.removeEdge(source, target);
  tracer?.logGraphChange('remove_dependency', { source, target, removed });
  return removed;
}

export function removeTask(session: Session, id: string, tracer?: DebugTracer): void {
  session.graph.removeNode(id);
  tracer?.logGraphChange('remove_task', { id });
}

export function setTaskStatus(
  session: Session,
  id: string,
  status: NodeStatus,
  tracer?: DebugTracer
): NodeTransition {
  const node = session.graph.getNode(id);
  if (!node) {
    throw new NodeReferenceError(id);
  }
  const transition: NodeTransition = { nodeId: id, from: node.status, to: status };
  session.graph.updateStatus(id, status);
  tracer?.logTaskStatusChange(id, transition.from, status, 'manual');
  return transition;
}
