import type { TaskGraph } from '../graph/store.js';

export type EffortLevel = 'low' | 'medium' | 'high';
export type ModelTier = 'haiku' | 'sonnet' | 'opus';

export interface Session {
  // Identity
  sessionId: string;
  goal: string;
  effort: EffortLevel;

  // advance() calls made on this session
  tick: number;

  graph: TaskGraph;

  createdAt: string;
  updatedAt: string;
  stateDir: string;
}
