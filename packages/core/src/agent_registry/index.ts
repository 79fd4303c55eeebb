export { AgentRegistry } from './agent_registry';
export { RegistryError, NoAgentsConfiguredError, UnknownAgentError } from './errors';
export type {
  AgentRef,
  AgentStatus,
  AgentRegistryDependencies,
  IAgentRegistry,
} from './agent_registry.types';
