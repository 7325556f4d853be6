import type { NodeStatus, NodeTransition } from '../types/index.js';
import type { DebugTracer, GraphChangeEvent, StatusChangeSource } from './types.js';

class NoopTracer implements DebugTracer {
  async init(_sessionId: string, _goal: string, _effort: string): Promise<void> {}
  async finalize(): Promise<void> {}
  logTick(_tick: number, _transitions: NodeTransition[]): void {}
  async logAgentCall(_opts: {
    prompt: string;
    response: string;
    costUsd: number;
    durationMs: number;
  }): Promise<void> {}
  logMcpToolCall(
    _tool: string,
    _input: Record<string, unknown>,
    _result: Record<string, unknown>
  ): void {}
  logDecision(
    _category: string,
    _input: Record<string, unknown>,
    _outcome: string,
    _reason: string
  ): void {}
  logTaskStatusChange(
    _taskId: string,
    _previousStatus: NodeStatus,
    _newStatus: NodeStatus,
    _source: StatusChangeSource
  ): void {}
  logGraphChange(
    _operation: GraphChangeEvent['operation'],
    _detail: Record<string, unknown>
  ): void {}
  logError(_error: string, _context?: Record<string, unknown>): void {}
}

export function createNoopTracer(): DebugTracer {
  return new NoopTracer();
}
