export { WorkflowGraph } from './workflow-graph.js';
export type { GraphDefaults } from './workflow-graph.js';
export { buildGraph, loadGraphFile, GraphFileSchema } from './loader.js';
export type { GraphFile, GraphFileInput } from './loader.js';
export type {
  NodeDefinition,
  NodeOptions,
  NodeSelection,
  RouteInput,
  EdgePredicate,
  EdgeKind,
  EdgeRule,
  RouteTarget,
  ConditionalRoute,
  TerminalOutcome,
} from './types.js';
