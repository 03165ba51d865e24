export { AgentRegistry } from './agent-registry.js';
export type { AgentRegistryOptions, ResolvedAgent, HealthChange, HealthListener } from './agent-registry.js';
export { loadDescriptorFile, parseDescriptors } from './descriptor-file.js';
