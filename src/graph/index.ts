export { TaskGraph } from './store.js';
export { CycleError, GraphFormatError, NodeReferenceError } from './errors.js';
export {
  assertAcyclic,
  findCycle,
  isDag,
  longestPath,
  topologicalLayers,
  topologicalOrder,
} from './topology.js';
export { advance, findBlockedNodes } from './advance.js';
export { fromDict, toDict } from './serialize.js';
