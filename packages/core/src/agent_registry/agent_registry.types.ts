import type { AgentConfig } from '../config_manager';
import type { CoordinationStore } from '../coordination_store';
import type { IEventStream } from '../event_bus';
import type { Logger } from '../logger';

/**
 * A configured agent identity. Created at configuration load, never
 * removed while the process lives.
 */
export type AgentRef = AgentConfig;

export type AgentStatus = {
  name: string;
  email: string;
  activeTasks: number;
};

export type AgentRegistryDependencies = {
  /** Pool in configuration order; the order breaks selection ties */
  agents: AgentConfig[];
  store: CoordinationStore;
  /** TTL applied to counters and task sets (default: 24h) */
  retentionSeconds?: number;
  eventBus?: IEventStream;
  logger?: Logger;
};

/**
 * Agent pool with shared load counters.
 *
 * Callers that hand out tasks must use `assign`. `selectAgent` followed by
 * `markBusy` is two store round trips, and concurrent callers can all pick
 * the same agent. `markBusy` alone records a task whose agent is already
 * known.
 */
export interface IAgentRegistry {
  /** Select the least-busy agent and record the task against it in one step. */
  assign(taskId: string): Promise<AgentRef>;
  /** Least-busy agent right now, without recording anything. Not for assignment. */
  selectAgent(): Promise<AgentRef>;
  markBusy(agentName: string, taskId: string): Promise<void>;
  markFree(agentName: string, taskId: string): Promise<void>;
  getActiveTaskCount(agentName: string): Promise<number>;
  getStatus(): Promise<AgentStatus[]>;
  getAgents(): AgentRef[];
  findAgent(agentName: string): AgentRef | undefined;
  isDegraded(): boolean;
}
