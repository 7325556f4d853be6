import { randomUUID } from 'node:crypto';
import type {
  DependencyType,
  NodeAttributes,
  NodeStatus,
  Payload,
  TaskEdge,
  TaskNode,
} from '../types/index.js';
import { NodeReferenceError } from './errors.js';

interface AdjacencyIndex {
  predecessors: Map<string, Set<string>>;
  successors: Map<string, Set<string>>;
  hardPredecessors: Map<string, Set<string>>;
  incoming: Map<string, TaskEdge[]>;
}

function emptyIndex(): AdjacencyIndex {
  return {
    predecessors: new Map(),
    successors: new Map(),
    hardPredecessors: new Map(),
    incoming: new Map(),
  };
}

/**
 * Task dependency graph: the single owner of nodes, edges and the adjacency
 * index derived from them.
 *
 * Every mutating method validates its arguments before touching state, so a
 * thrown error always leaves the graph as it was. The adjacency index is
 * rebuilt from the canonical node/edge collections after each structural
 * change and swapped in whole; it is never handed out.
 */
export class TaskGraph {
  private readonly nodeMap = new Map<string, TaskNode>();
  private edgeList: TaskEdge[] = [];
  private index: AdjacencyIndex = emptyIndex();

  get nodes(): readonly Readonly<TaskNode>[] {
    return [...this.nodeMap.values()];
  }

  get edges(): readonly TaskEdge[] {
    return this.edgeList;
  }

  get size(): number {
    return this.nodeMap.size;
  }

  /** Node ids in insertion order. */
  nodeIds(): string[] {
    return [...this.nodeMap.keys()];
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): Readonly<TaskNode> | undefined {
    return this.nodeMap.get(id);
  }

  addNode(description: string, attributes: NodeAttributes = {}): string {
    return this.insertNode({
      id: randomUUID(),
      description,
      status: 'pending',
      inputs: attributes.inputs ?? null,
      outputs: attributes.outputs ?? null,
    });
  }

  /**
   * Insert a node under a caller-chosen id. Used when rebuilding a graph from
   * its serialized form, where ids must survive the round trip.
   */
  restoreNode(node: TaskNode): string {
    if (this.nodeMap.has(node.id)) {
      throw new Error(`Node ${node.id} already exists`);
    }
    return this.insertNode({ ...node });
  }

  addEdge(
    source: string,
    target: string,
    dependencyType: DependencyType = 'hard',
    dataTransfer: Payload | null = null
  ): void {
    this.requireNode(source);
    this.requireNode(target);

    this.edgeList = [...this.edgeList, { source, target, dependencyType, dataTransfer }];
    this.reindex();
  }

  /**
   * Remove every edge from `source` to `target`. Returns how many were removed.
   */
  removeEdge(source: string, target: string): number {
    this.requireNode(source);
    this.requireNode(target);

    const kept = this.edgeList.filter((e) => e.source !== source || e.target !== target);
    const removed = this.edgeList.length - kept.length;
    if (removed > 0) {
      this.edgeList = kept;
      this.reindex();
    }
    return removed;
  }

  /**
   * Overwrite a node's status. No transition rules apply here: manual callers
   * may roll a node back or fail it.
   */
  updateStatus(id: string, status: NodeStatus): void {
    this.requireNode(id).status = status;
  }

  /**
   * Delete a node together with every edge touching it. Dependents silently
   * lose the incoming edge; their status is left alone.
   */
  removeNode(id: string): void {
    this.requireNode(id);

    this.nodeMap.delete(id);
    this.edgeList = this.edgeList.filter((e) => e.source !== id && e.target !== id);
    this.reindex();
  }

  getPredecessors(id: string): Set<string> {
    this.requireNode(id);
    return new Set(this.index.predecessors.get(id));
  }

  getSuccessors(id: string): Set<string> {
    this.requireNode(id);
    return new Set(this.index.successors.get(id));
  }

  /** Incoming edges of a node in edge-list order, duplicates included. */
  getIncomingEdges(id: string): TaskEdge[] {
    this.requireNode(id);
    return [...(this.index.incoming.get(id) ?? [])];
  }

  /**
   * Predecessors joined to `id` by at least one hard edge. A pair linked by
   * both a soft and a hard edge counts as hard.
   */
  getHardPredecessors(id: string): Set<string> {
    this.requireNode(id);
    return new Set(this.index.hardPredecessors.get(id));
  }

  getRootNodes(): string[] {
    return this.nodeIds().filter((id) => (this.index.predecessors.get(id)?.size ?? 0) === 0);
  }

  getLeafNodes(): string[] {
    return this.nodeIds().filter((id) => (this.index.successors.get(id)?.size ?? 0) === 0);
  }

  private insertNode(node: TaskNode): string {
    this.nodeMap.set(node.id, node);
    this.index.predecessors.set(node.id, new Set());
    this.index.successors.set(node.id, new Set());
    this.index.hardPredecessors.set(node.id, new Set());
    this.index.incoming.set(node.id, []);
    return node.id;
  }

  private requireNode(id: string): TaskNode {
    const node = this.nodeMap.get(id);
    if (!node) {
      throw new NodeReferenceError(id);
    }
    return node;
  }

  private reindex(): void {
    const index = emptyIndex();

    for (const id of this.nodeMap.keys()) {
      index.predecessors.set(id, new Set());
      index.successors.set(id, new Set());
      index.hardPredecessors.set(id, new Set());
      index.incoming.set(id, []);
    }

    for (const edge of this.edgeList) {
      index.successors.get(edge.source)?.add(edge.target);
      index.predecessors.get(edge.target)?.add(edge.source);
      index.incoming.get(edge.target)?.push(edge);
      if (edge.dependencyType === 'hard') {
        index.hardPredecessors.get(edge.target)?.add(edge.source);
      }
    }

    this.index = index;
  }
}
