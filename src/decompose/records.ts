import type { DebugTracer } from '../debug/index.js';
import { TaskGraph } from '../graph/index.js';
import { DecompositionSchema } from '../state/schema.js';
import type { DecompositionRecord } from '../types/index.js';
import { JSONExtractionError, extractJSON } from '../utils/json-parser.js';

/**
 * Build a fresh graph from decomposer records.
 *
 * Nodes are created first so forward references resolve. Each dependency
 * becomes a hard edge from the prerequisite to the dependent; dependency ids
 * that name no record are skipped.
 */
export function buildGraphFromRecords(records: readonly DecompositionRecord[]): TaskGraph {
  const graph = new TaskGraph();
  const idMap = new Map<number, string>();

  for (const record of records) {
    idMap.set(record.id, graph.addNode(record.description));
  }

  for (const record of records) {
    const target = idMap.get(record.id);
    if (target === undefined) continue;

    for (const dependency of record.dependencies) {
      const source = idMap.get(dependency);
      if (source === undefined) continue;
      graph.addEdge(source, target, 'hard');
    }
  }

  return graph;
}

export interface ParsedDecomposition {
  graph: TaskGraph;
  records: DecompositionRecord[];
  // Set when the output was malformed and the graph is empty
  error: string | null;
}

/**
 * Turn raw decomposer output into a graph. Output that holds no valid
 * `{ tasks: [...] }` object yields an empty graph, never a partial one.
 */
export function graphFromAgentOutput(output: string, tracer?: DebugTracer): ParsedDecomposition {
  try {
    const { tasks } = extractJSON(output, DecompositionSchema);
    tracer?.logDecision(
      'decomposition',
      { taskCount: tasks.length },
      'graph_built',
      `Parsed ${tasks.length} task records`
    );
    return { graph: buildGraphFromRecords(tasks), records: tasks, error: null };
  } catch (err) {
    if (!(err instanceof JSONExtractionError)) {
      throw err;
    }
    const reason = err.issues.length > 0 ? `${err.message}: ${err.issues.join('; ')}` : err.message;
    tracer?.logDecision('decomposition', { output: err.rawOutput }, 'empty_graph', reason);
    return { graph: new TaskGraph(), records: [], error: reason };
  }
}
