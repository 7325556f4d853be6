import { getEffortConfig, getModelId } from '../config/effort.js';
import type { EffortLevel } from '../types/index.js';

export interface AgentConfig {
  cwd: string;
  allowedTools: string[];
  permissionMode: 'default' | 'bypassPermissions';
  maxTurns: number;
  model: string;
}

/**
 * Agent config for goal decomposition. The decomposer only writes text, so it
 * gets no tools and the default permission mode.
 */
export function createAgentConfig(effort: EffortLevel, cwd: string): AgentConfig {
  const effortConfig = getEffortConfig(effort);

  return {
    cwd,
    allowedTools: [],
    permissionMode: 'default',
    maxTurns: effortConfig.maxTurns,
    model: getModelId(effortConfig.model),
  };
}
