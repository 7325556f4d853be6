import { query } from '@anthropic-ai/claude-agent-sdk';
import { buildDecomposePrompt } from '../agents/prompts.js';
import { type AgentConfig, createAgentConfig } from '../agents/spawn.js';
import { getEffortConfig } from '../config/effort.js';
import type { DebugTracer } from '../debug/index.js';
import type { EffortLevel } from '../types/index.js';
import {
  extractAssistantText,
  extractCost,
  extractResultText,
  isAssistantMessage,
  isResultMessage,
} from '../types/index.js';
import { type ParsedDecomposition, graphFromAgentOutput } from './records.js';

/**
 * Thrown when the agent run ends without a successful result message
 * (crash, turn limit, execution error).
 */
export class DecompositionIncompleteError extends Error {
  constructor(
    public readonly reason: string,
    public readonly output: string
  ) {
    super(
      `Goal decomposition did not complete (${reason}). Last output: "${output.slice(-200)}"`
    );
    this.name = 'DecompositionIncompleteError';
  }
}

export interface AgentRun {
  output: string;
  costUsd: number;
}

/** Runs one prompt against a text-generation agent. */
export interface GoalDecomposer {
  run(prompt: string, config: AgentConfig): Promise<AgentRun>;
}

export function createAgentDecomposer(): GoalDecomposer {
  return {
    async run(prompt, config) {
      let streamed = '';
      let resultText: string | null = null;
      let costUsd = 0;
      let sawResult = false;
      let subtype = 'no result message';

      for await (const message of query({
        prompt,
        options: {
          cwd: config.cwd,
          allowedTools: config.allowedTools,
          permissionMode: config.permissionMode,
          maxTurns: config.maxTurns,
          model: config.model,
        },
      })) {
        if (isAssistantMessage(message)) {
          streamed += extractAssistantText(message);
        }
        if (isResultMessage(message)) {
          sawResult = true;
          subtype = message.subtype;
          costUsd = extractCost(message);
          resultText = extractResultText(message);
        }
      }

      if (!sawResult || resultText === null) {
        throw new DecompositionIncompleteError(subtype, streamed);
      }

      return { output: resultText, costUsd };
    },
  };
}

export interface DecomposeOptions {
  effort: EffortLevel;
  cwd: string;
  maxTasks?: number;
  decomposer?: GoalDecomposer;
  tracer?: DebugTracer;
}

export interface DecomposeResult extends ParsedDecomposition {
  costUsd: number;
}

/**
 * Ask the agent to break `goal` into tasks and build the dependency graph.
 * Malformed output gives an empty graph with `error` set.
 */
export async function decomposeGoal(
  goal: string,
  options: DecomposeOptions
): Promise<DecomposeResult> {
  const maxTasks = options.maxTasks ?? getEffortConfig(options.effort).maxTasks;
  const prompt = buildDecomposePrompt(goal, maxTasks);
  const config = createAgentConfig(options.effort, options.cwd);
  const decomposer = options.decomposer ?? createAgentDecomposer();

  const startTime = Date.now();
  const { output, costUsd } = await decomposer.run(prompt, config);

  await options.tracer?.logAgentCall({
    prompt,
    response: output,
    costUsd,
    durationMs: Date.now() - startTime,
  });

  const parsed = graphFromAgentOutput(output, options.tracer);
  if (parsed.error !== null) {
    console.warn(`Decomposition output was malformed, starting with an empty graph: ${parsed.error}`);
  }
  return { ...parsed, costUsd };
}
