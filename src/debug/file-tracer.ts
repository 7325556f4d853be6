import { mkdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { NodeStatus, NodeTransition } from '../types/index.js';
import type {
  DebugEvent,
  DebugTracer,
  GraphChangeEvent,
  StatusChangeSource,
  TraceFile,
} from './types.js';

class FileTracer implements DebugTracer {
  private stateDir: string;
  private debugDir = '';
  private outputsDir = '';
  private trace: TraceFile | null = null;
  private outputCounter = 0;
  private writePromise: Promise<void> = Promise.resolve();
  private writeError: Error | null = null;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  async init(sessionId: string, goal: string, effort: string): Promise<void> {
    this.debugDir = join(this.stateDir, 'debug', sessionId);
    this.outputsDir = join(this.debugDir, 'outputs');

    mkdirSync(this.debugDir, { recursive: true });
    mkdirSync(this.outputsDir, { recursive: true });

    this.trace = {
      sessionId,
      goal,
      effort,
      startedAt: new Date().toISOString(),
      completedAt: null,
      events: [],
    };

    await this.saveTrace();
  }

  async finalize(): Promise<void> {
    if (this.trace) {
      this.trace.completedAt = new Date().toISOString();
      await this.saveTrace();
    }
    if (this.writeError) {
      throw this.writeError;
    }
  }

  logTick(tick: number, transitions: NodeTransition[]): void {
    this.addEvent({
      type: 'tick',
      timestamp: new Date().toISOString(),
      tick,
      transitions,
    });
  }

  async logAgentCall(opts: {
    prompt: string;
    response: string;
    costUsd: number;
    durationMs: number;
  }): Promise<void> {
    if (!this.trace) return;

    this.outputCounter++;
    const promptFile = `decompose-${this.outputCounter}-prompt.txt`;
    const responseFile = `decompose-${this.outputCounter}-response.txt`;

    await writeFile(join(this.outputsDir, promptFile), opts.prompt);
    await writeFile(join(this.outputsDir, responseFile), opts.response);

    this.addEvent({
      type: 'agent_call',
      timestamp: new Date().toISOString(),
      promptFile: `outputs/${promptFile}`,
      responseFile: `outputs/${responseFile}`,
      costUsd: opts.costUsd,
      durationMs: opts.durationMs,
    });
  }

  logMcpToolCall(
    tool: string,
    input: Record<string, unknown>,
    result: Record<string, unknown>
  ): void {
    this.addEvent({
      type: 'mcp_tool_call',
      timestamp: new Date().toISOString(),
      tool,
      input,
      result,
    });
  }

  logDecision(
    category: string,
    input: Record<string, unknown>,
    outcome: string,
    reason: string
  ): void {
    this.addEvent({
      type: 'decision',
      timestamp: new Date().toISOString(),
      category,
      input,
      outcome,
      reason,
    });
  }

  logTaskStatusChange(
    taskId: string,
    previousStatus: NodeStatus,
    newStatus: NodeStatus,
    source: StatusChangeSource
  ): void {
    this.addEvent({
      type: 'task_status_change',
      timestamp: new Date().toISOString(),
      taskId,
      previousStatus,
      newStatus,
      source,
    });
  }

  logGraphChange(operation: GraphChangeEvent['operation'], detail: Record<string, unknown>): void {
    this.addEvent({
      type: 'graph_change',
      timestamp: new Date().toISOString(),
      operation,
      detail,
    });
  }

  logError(error: string, context?: Record<string, unknown>): void {
    this.addEvent({
      type: 'error',
      timestamp: new Date().toISOString(),
      error,
      context,
    });
  }

  private addEvent(event: DebugEvent): void {
    if (this.trace) {
      this.trace.events.push(event);
      // Save after each event for crash recovery; writes are chained so they never interleave.
      // A failed write is kept and rethrown from finalize().
      this.writePromise = this.writePromise
        .then(() => this.doSaveTrace())
        .catch((e: unknown) => {
          this.writeError = e instanceof Error ? e : new Error(String(e));
        });
    }
  }

  private async saveTrace(): Promise<void> {
    // Wait for any pending writes then do a final write
    await this.writePromise;
    await this.doSaveTrace();
  }

  private async doSaveTrace(): Promise<void> {
    if (this.trace) {
      await writeFile(join(this.debugDir, 'trace.json'), JSON.stringify(this.trace, null, 2));
    }
  }
}

export function createFileTracer(stateDir: string): DebugTracer {
  return new FileTracer(stateDir);
}
