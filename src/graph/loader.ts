import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConditionSchema } from '../policy/index.js';
import { Tier } from '../types/index.js';
import { ValidationError, formatZodError } from '../errors/index.js';
import { WorkflowGraph } from './workflow-graph.js';
import type { GraphDefaults } from './workflow-graph.js';

const Terminal = z.object({ terminal: z.enum(['succeeded', 'failed']) });
const RouteTargetSchema = z.union([z.string().min(1), Terminal]);

const GraphNodeSchema = z.object({
  id: z.string().min(1),
  capability: z.string().min(1),
  tier: Tier.default('operational'),
  maxRetries: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().positive().optional(),
  requiredFields: z.array(z.string().min(1)).default([]),
  escalation: z.record(Tier, z.string().min(1)).default({}),
  fanIn: z.boolean().default(false),
});

const GraphEdgeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('sequential'), from: z.string().min(1), to: z.string().min(1) }),
  z.object({
    type: z.literal('conditional'),
    from: z.string().min(1),
    routes: z.array(z.object({ when: z.array(ConditionSchema).min(1), to: RouteTargetSchema })).min(1),
    otherwise: RouteTargetSchema,
  }),
  z.object({
    type: z.literal('fan_out'),
    from: z.string().min(1),
    branches: z.array(z.string().min(1)).min(1),
    join: z.string().min(1),
    quorum: z.number().int().positive().optional(),
  }),
  z.object({
    type: z.literal('terminal'),
    from: z.string().min(1),
    outcome: z.enum(['succeeded', 'failed']).default('succeeded'),
  }),
]);

export const GraphFileSchema = z.object({
  version: z.literal(1),
  name: z.string().optional(),
  entry: z.array(z.string().min(1)).min(1),
  escalationTargets: z.record(Tier, z.string().min(1)).default({}),
  nodes: z.array(GraphNodeSchema).min(1),
  edges: z.array(GraphEdgeSchema),
});

export type GraphFile = z.infer<typeof GraphFileSchema>;
export type GraphFileInput = z.input<typeof GraphFileSchema>;

/** Build and validate a graph from its declarative form. */
export function buildGraph(input: unknown, defaults: Partial<GraphDefaults> = {}): WorkflowGraph {
  const parsed = GraphFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    throw new ValidationError(`Graph definition is malformed: ${issues.join('; ')}`, issues);
  }
  const def = parsed.data;
  const graph = new WorkflowGraph(defaults);

  for (const node of def.nodes) {
    graph.addNode(node.id, node.capability, {
      tier: node.tier,
      maxRetries: node.maxRetries,
      timeoutMs: node.timeoutMs,
      requiredFields: node.requiredFields,
      escalation: node.escalation,
      fanIn: node.fanIn,
    });
  }
  for (const entry of def.entry) graph.addEntry(entry);
  for (const [tier, target] of Object.entries(def.escalationTargets)) {
    if (target !== undefined) graph.setEscalationTarget(Tier.parse(tier), target);
  }

  for (const edge of def.edges) {
    switch (edge.type) {
      case 'sequential':
        graph.sequential(edge.from, edge.to);
        break;
      case 'conditional':
        graph.conditional(edge.from, edge.routes, edge.otherwise);
        break;
      case 'fan_out':
        graph.fanOut(edge.from, edge.branches, edge.join, { quorum: edge.quorum });
        break;
      case 'terminal':
        graph.terminal(edge.from, edge.outcome);
        break;
    }
  }

  graph.validate();
  return graph;
}

export async function loadGraphFile(path: string, defaults: Partial<GraphDefaults> = {}): Promise<WorkflowGraph> {
  const raw = await readFile(path, 'utf-8');
  return buildGraph(JSON.parse(raw), defaults);
}
