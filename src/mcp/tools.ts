import { z } from 'zod';
import { DependencyTypeSchema, NodeStatusSchema } from '../state/schema.js';

// Tool schemas for MCP
export const AddTaskSchema = z.object({
  description: z.string().min(1).describe('What the task does'),
});

export const AddDependencySchema = z.object({
  source: z.string().describe('ID of the task that must finish first'),
  target: z.string().describe('ID of the task that waits on source'),
  dependencyType: DependencyTypeSchema.default('hard').describe(
    'hard gates advancement, soft is informational'
  ),
});

export const RemoveDependencySchema = z.object({
  source: z.string().describe('ID of the prerequisite task'),
  target: z.string().describe('ID of the dependent task'),
});

export const RemoveTaskSchema = z.object({
  taskId: z.string().describe('ID of task to remove'),
});

export const SetTaskStatusSchema = z.object({
  taskId: z.string().describe('ID of task to update'),
  status: NodeStatusSchema.describe('New status'),
});

export const AdvanceSchema = z.object({});

export const GetGraphSchema = z.object({});

export const TOOL_NAMES = [
  'add_task',
  'add_dependency',
  'remove_dependency',
  'remove_task',
  'set_task_status',
  'advance',
  'get_graph',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

// Tools that leave the graph untouched skip the save
export const READ_ONLY_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>(['get_graph']);

const TASK_ID = { type: 'string', description: 'Task ID' };

export const TOOL_DEFINITIONS = [
  {
    name: 'add_task',
    description: 'Add a pending task to the graph',
    inputSchema: {
      type: 'object' as const,
      properties: {
        description: { type: 'string', description: 'What the task does' },
      },
      required: ['description'],
    },
  },
  {
    name: 'add_dependency',
    description: 'Make target wait until source is completed',
    inputSchema: {
      type: 'object' as const,
      properties: {
        source: { type: 'string', description: 'ID of the task that must finish first' },
        target: { type: 'string', description: 'ID of the task that waits on source' },
        dependencyType: {
          type: 'string',
          enum: ['hard', 'soft'],
          description: 'hard gates advancement (default), soft is informational',
        },
      },
      required: ['source', 'target'],
    },
  },
  {
    name: 'remove_dependency',
    description: 'Remove every dependency from source to target',
    inputSchema: {
      type: 'object' as const,
      properties: {
        source: { type: 'string', description: 'ID of the prerequisite task' },
        target: { type: 'string', description: 'ID of the dependent task' },
      },
      required: ['source', 'target'],
    },
  },
  {
    name: 'remove_task',
    description: 'Remove a task and all of its dependencies',
    inputSchema: {
      type: 'object' as const,
      properties: { taskId: TASK_ID },
      required: ['taskId'],
    },
  },
  {
    name: 'set_task_status',
    description: 'Override the status of a task',
    inputSchema: {
      type: 'object' as const,
      properties: {
        taskId: TASK_ID,
        status: {
          type: 'string',
          enum: ['pending', 'in_progress', 'completed', 'failed'],
          description: 'New status',
        },
      },
      required: ['taskId', 'status'],
    },
  },
  {
    name: 'advance',
    description: 'Run one advancement tick and list the status transitions',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'get_graph',
    description: 'Return the task graph as JSON',
    inputSchema: { type: 'object' as const, properties: {} },
  },
] satisfies ReadonlyArray<{ name: ToolName; description: string; inputSchema: object }>;
