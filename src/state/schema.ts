import { z } from 'zod';

export const NodeStatusSchema = z.enum(['pending', 'in_progress', 'completed', 'failed']);
export const DependencyTypeSchema = z.enum(['hard', 'soft']);

const PayloadSchema = z.record(z.unknown()).nullable().default(null);

// Interchange format (snake_case keys are part of the format)
export const SerializedNodeSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  status: NodeStatusSchema.default('pending'),
  inputs: PayloadSchema,
  outputs: PayloadSchema,
});

export const SerializedEdgeSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  dependency_type: DependencyTypeSchema.default('hard'),
  data_transfer: PayloadSchema,
});

export const SerializedGraphSchema = z.object({
  nodes: z.record(SerializedNodeSchema).default({}),
  edges: z.array(SerializedEdgeSchema).default([]),
});

export type SerializedNode = z.infer<typeof SerializedNodeSchema>;
export type SerializedEdge = z.infer<typeof SerializedEdgeSchema>;
export type SerializedGraph = z.infer<typeof SerializedGraphSchema>;

// Goal decomposer output
export const DecompositionRecordSchema = z.object({
  id: z.number().int(),
  description: z.string().min(1),
  dependencies: z.array(z.number().int()).default([]),
});

export const DecompositionSchema = z
  .object({
    tasks: z.array(DecompositionRecordSchema),
  })
  .refine((value) => new Set(value.tasks.map((t) => t.id)).size === value.tasks.length, {
    message: 'Task ids must be unique',
    path: ['tasks'],
  });

export type Decomposition = z.infer<typeof DecompositionSchema>;
