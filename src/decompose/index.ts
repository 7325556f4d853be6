export { buildGraphFromRecords, graphFromAgentOutput } from './records.js';
export type { ParsedDecomposition } from './records.js';
export {
  DecompositionIncompleteError,
  createAgentDecomposer,
  decomposeGoal,
} from './agent.js';
export type { AgentRun, DecomposeOptions, DecomposeResult, GoalDecomposer } from './agent.js';
