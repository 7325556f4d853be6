import type { EffortLevel, ModelTier } from '../types/index.js';

// Model IDs for each tier
const MODEL_IDS: Record<ModelTier, string> = {
  haiku: 'claude-haiku-4-5-20251001',
  sonnet: 'claude-sonnet-4-5-20250929',
  opus: 'claude-opus-4-20250514',
};

export function getModelId(tier: ModelTier): string {
  return MODEL_IDS[tier];
}

export interface EffortConfig {
  maxTasks: number; // Upper bound requested from the decomposer
  maxTurns: number; // Agent turn limit for one decomposition
  model: ModelTier;
  maxTicks: number; // Default cap for `run`
}

const EFFORT_CONFIGS: Record<EffortLevel, EffortConfig> = {
  low: {
    maxTasks: 5,
    maxTurns: 3,
    model: 'haiku',
    maxTicks: 50,
  },
  medium: {
    maxTasks: 10,
    maxTurns: 5,
    model: 'sonnet',
    maxTicks: 100,
  },
  high: {
    maxTasks: 20,
    maxTurns: 8,
    model: 'opus',
    maxTicks: 200,
  },
};

export const EFFORT_LEVELS: readonly EffortLevel[] = ['low', 'medium', 'high'];

export function getEffortConfig(effort: EffortLevel): EffortConfig {
  return EFFORT_CONFIGS[effort];
}

export function isEffortLevel(value: string): value is EffortLevel {
  return EFFORT_LEVELS.some((level) => level === value);
}
