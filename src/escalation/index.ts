export { EscalationPolicy } from './policy.js';
export type { EscalationDecision, EscalationState, EscalationTrigger } from './policy.js';
