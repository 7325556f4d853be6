import { type SerializedGraph, SerializedGraphSchema } from '../state/schema.js';
import { GraphFormatError } from './errors.js';
import { TaskGraph } from './store.js';

/**
 * Convert a graph to the interchange format.
 */
export function toDict(graph: TaskGraph): SerializedGraph {
  const nodes: SerializedGraph['nodes'] = {};
  for (const node of graph.nodes) {
    nodes[node.id] = {
      id: node.id,
      description: node.description,
      status: node.status,
      inputs: node.inputs,
      outputs: node.outputs,
    };
  }

  return {
    nodes,
    edges: graph.edges.map((edge) => ({
      source: edge.source,
      target: edge.target,
      dependency_type: edge.dependencyType,
      data_transfer: edge.dataTransfer,
    })),
  };
}

/**
 * Rebuild a graph from the interchange format. Edges go through the store, so
 * one naming a missing node raises NodeReferenceError.
 *
 * @throws GraphFormatError if the payload does not match the format
 */
export function fromDict(data: unknown): TaskGraph {
  const parsed = SerializedGraphSchema.safeParse(data);
  if (!parsed.success) {
    throw new GraphFormatError(
      'Invalid graph payload',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const mismatched = Object.entries(parsed.data.nodes)
    .filter(([key, node]) => key !== node.id)
    .map(([key, node]) => `nodes.${key}: key does not match id "${node.id}"`);
  if (mismatched.length > 0) {
    throw new GraphFormatError('Invalid graph payload', mismatched);
  }

  const graph = new TaskGraph();
  for (const node of Object.values(parsed.data.nodes)) {
    graph.restoreNode(node);
  }
  for (const edge of parsed.data.edges) {
    graph.addEdge(edge.source, edge.target, edge.dependency_type, edge.data_transfer);
  }
  return graph;
}
