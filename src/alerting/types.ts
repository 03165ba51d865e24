import { z } from 'zod';

export const AlertKind = z.enum([
  'high_cpu',
  'high_memory',
  'high_http_error_rate',
  'low_success_rate',
  'escalation_exhausted',
  'task_failed',
  'sla_breach',
  'agent_unavailable',
  'agent_degraded',
  'agent_recovered',
  'test',
]);
export type AlertKind = z.infer<typeof AlertKind>;

export const AlertSeverity = z.enum(['info', 'warning', 'critical']);
export type AlertSeverity = z.infer<typeof AlertSeverity>;

export interface Alert {
  id: string;
  kind: AlertKind;
  severity: AlertSeverity;
  title: string;
  message: string;
  agentId?: string;
  taskId?: string;
  /** The metrics window a threshold alert was evaluated over */
  window?: { start: string; end: string };
  timestamp: string;
}

export type AlertListener = (alert: Alert) => void;

/** Delivers alerts outside the process, e.g. to a chat channel. */
export interface AlertSender {
  send(alert: Alert): Promise<void>;
}
