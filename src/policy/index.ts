export { evaluateCondition, evaluateAll, matchPattern, readField } from './conditions.js';
export { ConditionOp, ConditionSchema, ValueThresholdSchema } from './types.js';
export type { Condition, ValueThreshold, ValueThresholdInput } from './types.js';
