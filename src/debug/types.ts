// src/debug/types.ts
import type { NodeStatus, NodeTransition } from '../types/index.js';

export interface TraceEvent {
  type: string;
  timestamp: string;
}

export interface TickEvent extends TraceEvent {
  type: 'tick';
  tick: number;
  transitions: NodeTransition[];
}

export interface AgentCallEvent extends TraceEvent {
  type: 'agent_call';
  promptFile: string;
  responseFile: string;
  costUsd: number;
  durationMs: number;
}

export interface McpToolCallEvent extends TraceEvent {
  type: 'mcp_tool_call';
  tool: string;
  input: Record<string, unknown>;
  result: Record<string, unknown>;
}

export interface DecisionEvent extends TraceEvent {
  type: 'decision';
  category: string;
  input: Record<string, unknown>;
  outcome: string;
  reason: string;
}

export type StatusChangeSource = 'advance' | 'manual';

export interface TaskEvent extends TraceEvent {
  type: 'task_status_change';
  taskId: string;
  previousStatus: NodeStatus;
  newStatus: NodeStatus;
  source: StatusChangeSource;
}

export interface GraphChangeEvent extends TraceEvent {
  type: 'graph_change';
  operation: 'add_task' | 'remove_task' | 'add_dependency' | 'remove_dependency' | 'import';
  detail: Record<string, unknown>;
}

export interface ErrorEvent extends TraceEvent {
  type: 'error';
  error: string;
  context?: Record<string, unknown>;
}

export type DebugEvent =
  | TickEvent
  | AgentCallEvent
  | McpToolCallEvent
  | DecisionEvent
  | TaskEvent
  | GraphChangeEvent
  | ErrorEvent;

export interface TraceFile {
  sessionId: string;
  goal: string;
  effort: string;
  startedAt: string;
  completedAt: string | null;
  events: DebugEvent[];
}

export interface DebugTracer {
  init(sessionId: string, goal: string, effort: string): Promise<void>;
  finalize(): Promise<void>;
  logTick(tick: number, transitions: NodeTransition[]): void;
  logAgentCall(opts: {
    prompt: string;
    response: string;
    costUsd: number;
    durationMs: number;
  }): Promise<void>;
  logMcpToolCall(
    tool: string,
    input: Record<string, unknown>,
    result: Record<string, unknown>
  ): void;
  logDecision(
    category: string,
    input: Record<string, unknown>,
    outcome: string,
    reason: string
  ): void;
  logTaskStatusChange(
    taskId: string,
    previousStatus: NodeStatus,
    newStatus: NodeStatus,
    source: StatusChangeSource
  ): void;
  logGraphChange(operation: GraphChangeEvent['operation'], detail: Record<string, unknown>): void;
  logError(error: string, context?: Record<string, unknown>): void;
}
