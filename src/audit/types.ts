import { z } from 'zod';

export const AuditAction = z.enum([
  'task.submit',
  'task.escalate',
  'task.reset',
  'task.succeed',
  'task.fail',
  'task.cancel',
  'task.replay',
  'agent.health',
  'alert.raise',
]);

export type AuditAction = z.infer<typeof AuditAction>;

export const AuditEntrySchema = z.object({
  id: z.string().uuid(),
  timestamp: z.string().datetime(),
  action: AuditAction,
  actor: z.string().default('scheduler'),
  taskId: z.string().optional(),
  agentId: z.string().optional(),
  detail: z.record(z.unknown()).optional(),
  success: z.boolean(),
  error: z.string().optional(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export const AuditQuerySchema = z.object({
  action: AuditAction.optional(),
  taskId: z.string().optional(),
  agentId: z.string().optional(),
  since: z.string().datetime().optional(),
  limit: z.number().int().positive().default(50),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
export type AuditQueryInput = z.input<typeof AuditQuerySchema>;
