export type {
  DecompositionRecord,
  DependencyType,
  NodeAttributes,
  NodeStatus,
  NodeTransition,
  Payload,
  TaskEdge,
  TaskNode,
} from './task.js';
export { NODE_STATUSES } from './task.js';
export type { EffortLevel, ModelTier, Session } from './session.js';
export {
  type SDKAssistantMessage,
  type SDKMessage,
  type SDKResultMessage,
  extractAssistantText,
  extractCost,
  extractResultText,
  isAssistantMessage,
  isResultMessage,
} from './sdk.js';
