/**
 * Condition and threshold types.
 *
 * Conditions test a field of a task payload. They gate conditional graph
 * edges and the value thresholds that push a task to a higher tier.
 */
import { z } from 'zod';
import { Tier } from '../types/tier.js';

export const ConditionOp = z.enum(['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'notIn', 'contains', 'exists']);
export type ConditionOp = z.infer<typeof ConditionOp>;

const Scalar = z.union([z.string(), z.number(), z.boolean()]);

export const ConditionSchema = z.object({
  /** Dotted payload path (e.g. "lead_score", "proposal.value") */
  field: z.string().min(1),
  op: ConditionOp,
  /** Value(s) to compare against; ignored by `exists` */
  value: z.union([Scalar, z.array(Scalar)]).optional(),
});
export type Condition = z.infer<typeof ConditionSchema>;

export const ValueThresholdSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  /** Node pattern: "*", an exact node id, or a "prefix.*" glob */
  node: z.string().default('*'),
  /** All must hold (AND logic) */
  conditions: z.array(ConditionSchema).min(1),
  escalateTo: Tier,
});
export type ValueThreshold = z.infer<typeof ValueThresholdSchema>;
export type ValueThresholdInput = z.input<typeof ValueThresholdSchema>;
