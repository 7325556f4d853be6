export type NodeStatus = 'pending' | 'in_progress' | 'completed' | 'failed';
export type DependencyType = 'hard' | 'soft';

// Opaque to the engine; carried through serialization untouched
export type Payload = Record<string, unknown>;

export interface TaskNode {
  readonly id: string;
  description: string;
  status: NodeStatus;
  inputs: Payload | null;
  outputs: Payload | null;
}

export interface TaskEdge {
  readonly source: string; // must complete first
  readonly target: string; // waits on source
  readonly dependencyType: DependencyType;
  readonly dataTransfer: Payload | null;
}

export interface NodeAttributes {
  inputs?: Payload | null;
  outputs?: Payload | null;
}

export interface NodeTransition {
  nodeId: string;
  from: NodeStatus;
  to: NodeStatus;
}

/**
 * Post-parse record from the goal decomposer. `id` and `dependencies` are the
 * decomposer's own numbering, not graph node ids.
 */
export interface DecompositionRecord {
  id: number;
  description: string;
  dependencies: number[];
}

export const NODE_STATUSES: readonly NodeStatus[] = [
  'pending',
  'in_progress',
  'completed',
  'failed',
];
