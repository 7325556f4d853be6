import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { type DebugTracer, createNoopTracer } from '../debug/index.js';
import { toDict } from '../graph/index.js';
import {
  addDependency,
  addTask,
  advanceSession,
  removeDependency,
  removeTask,
  setTaskStatus,
} from '../orchestrator/index.js';
import { loadSession, saveSession } from '../state/index.js';
import type { Session } from '../types/index.js';
import {
  AddDependencySchema,
  AddTaskSchema,
  AdvanceSchema,
  GetGraphSchema,
  READ_ONLY_TOOLS,
  RemoveDependencySchema,
  RemoveTaskSchema,
  SetTaskStatusSchema,
  TOOL_DEFINITIONS,
  isToolName,
} from './tools.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/**
 * Apply one tool call to an in-memory session and describe the outcome.
 * Validation and graph errors are thrown; the server turns them into tool
 * errors.
 */
export function executeTool(
  session: Session,
  name: string,
  args: Record<string, unknown>,
  tracer?: DebugTracer
): string {
  if (!isToolName(name)) {
    throw new Error(`Unknown tool: ${name}`);
  }

  switch (name) {
    case 'add_task': {
      const { description } = AddTaskSchema.parse(args);
      const id = addTask(session, description, tracer);
      return `Task ${id} created`;
    }

    case 'add_dependency': {
      const { source, target, dependencyType } = AddDependencySchema.parse(args);
      const cycle = addDependency(session, source, target, dependencyType, tracer);
      const added = `Dependency ${source} -> ${target} (${dependencyType}) added`;
      return cycle
        ? `${added}. Warning: this closes the cycle ${cycle.join(' -> ')}; advance will fail until a dependency on it is removed`
        : added;
    }

    case 'remove_dependency': {
      const { source, target } = RemoveDependencySchema.parse(args);
      const removed = removeDependency(session, source, target, tracer);
      return `Removed ${removed} dependencies from ${source} to ${target}`;
    }

    case 'remove_task': {
      const { taskId } = RemoveTaskSchema.parse(args);
      removeTask(session, taskId, tracer);
      return `Task ${taskId} removed`;
    }

    case 'set_task_status': {
      const { taskId, status } = SetTaskStatusSchema.parse(args);
      const { from } = setTaskStatus(session, taskId, status, tracer);
      return `Task ${taskId}: ${from} -> ${status}`;
    }

    case 'advance': {
      AdvanceSchema.parse(args);
      const transitions = advanceSession(session, { tracer });
      if (transitions.length === 0) {
        return `Tick ${session.tick}: no transitions`;
      }
      return [
        `Tick ${session.tick}: ${transitions.length} transitions`,
        ...transitions.map((t) => `${t.nodeId}: ${t.from} -> ${t.to}`),
      ].join('\n');
    }

    case 'get_graph': {
      GetGraphSchema.parse(args);
      return JSON.stringify(toDict(session.graph), null, 2);
    }
  }
}

/**
 * MCP server over one persisted session. Each call reloads the session, so
 * edits made through the CLI between calls are seen, and saves it afterwards
 * unless the tool only reads.
 */
export function createMCPServer(
  stateDir: string,
  sessionId: string,
  tracer: DebugTracer = createNoopTracer()
) {
  const server = new Server({ name: 'taskdag', version: '1.0.0' }, { capabilities: { tools: {} } });

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFINITIONS,
  }));

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<ToolResult> => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};

    try {
      const session = loadSession(stateDir, sessionId);
      if (!session) {
        throw new Error(`Session ${sessionId} not found in ${stateDir}`);
      }

      const text = executeTool(session, name, args, tracer);
      if (!(isToolName(name) && READ_ONLY_TOOLS.has(name))) {
        saveSession(session);
      }

      tracer.logMcpToolCall(name, args, { success: true });
      return { content: [{ type: 'text', text }] };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      tracer.logMcpToolCall(name, args, { success: false, error: errorMessage });

      // Return error as tool result instead of throwing
      return {
        content: [{ type: 'text', text: `Error in ${name}: ${errorMessage}` }],
        isError: true,
      };
    }
  });

  return server;
}

export async function startMCPServer(stateDir: string, sessionId: string, tracer?: DebugTracer) {
  const server = createMCPServer(stateDir, sessionId, tracer);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
