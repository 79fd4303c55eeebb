/**
 * AgentRegistry - least-busy agent selection over the shared store
 *
 * Each agent owns two keys: `active_tasks:{agent}` (the load counter used for
 * selection) and `agent_tasks:{agent}` (the set of task ids it holds). Both
 * change in one store operation and the counter only moves when the set
 * does, which makes `markFree` idempotent and keeps the counter equal to
 * the set size.
 *
 * When the store is unreachable the registry enters degraded mode and hands
 * out agents from a local round-robin cursor until the store answers again.
 *
 * @example
 * ```typescript
 * const registry = new AgentRegistry({ agents: config.agents, store });
 * const agent = await registry.assign('C123_1700000000.000100');
 * // ... task runs ...
 * await registry.markFree(agent.name, 'C123_1700000000.000100');
 * ```
 */

import { StoreKeys, StoreUnavailableError, DEFAULT_RETENTION_SECONDS } from '../coordination_store';
import type { CoordinationStore, TrackedCounter } from '../coordination_store';
import type { IEventStream } from '../event_bus';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { NoAgentsConfiguredError, RegistryError, UnknownAgentError } from './errors';
import type {
  AgentRef,
  AgentRegistryDependencies,
  AgentStatus,
  IAgentRegistry,
} from './agent_registry.types';

function parseCount(value: string | null): number {
  if (value === null) return 0;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : Math.max(0, parsed);
}

export class AgentRegistry implements IAgentRegistry {
  private readonly agents: AgentRef[];
  private readonly store: CoordinationStore;
  private readonly retentionSeconds: number;
  private readonly eventBus: IEventStream | undefined;
  private readonly logger: Logger;
  private degraded = false;
  private cursor = 0;

  constructor(deps: AgentRegistryDependencies) {
    this.agents = deps.agents.map(agent => ({ ...agent }));
    this.store = deps.store;
    this.retentionSeconds = deps.retentionSeconds ?? DEFAULT_RETENTION_SECONDS;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? createLogger('[AgentRegistry] ');
  }

  // ==================== SELECTION ====================

  async assign(taskId: string): Promise<AgentRef> {
    const agents = this.requireAgents();

    try {
      const agent = await this.claim(agents, taskId);
      this.leaveDegradedMode();
      this.logger.debug(`Assigned ${taskId} to ${agent.name}`);
      return agent;
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      this.enterDegradedMode(error);
      return this.nextRoundRobin(agents);
    }
  }

  async selectAgent(): Promise<AgentRef> {
    const agents = this.requireAgents();

    try {
      const counts = await Promise.all(agents.map(agent => this.readCount(agent.name)));
      this.leaveDegradedMode();
      return this.leastBusy(agents, counts);
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      this.enterDegradedMode(error);
      return this.nextRoundRobin(agents);
    }
  }

  // ==================== LOAD TRACKING ====================

  async markBusy(agentName: string, taskId: string): Promise<void> {
    this.requireAgent(agentName);

    try {
      await this.store.trackMember(this.counterOf(agentName), taskId, this.retentionSeconds);
      this.leaveDegradedMode();
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      this.enterDegradedMode(error);
      this.logger.warn(`Could not mark ${agentName} busy with ${taskId} while degraded`);
    }
  }

  async markFree(agentName: string, taskId: string): Promise<void> {
    this.requireAgent(agentName);

    try {
      await this.store.untrackMember(this.counterOf(agentName), taskId);
      this.leaveDegradedMode();
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      this.enterDegradedMode(error);
      this.logger.warn(`Could not mark ${agentName} free of ${taskId} while degraded`);
    }
  }

  // ==================== QUERIES ====================

  async getActiveTaskCount(agentName: string): Promise<number> {
    this.requireAgent(agentName);
    return this.readCount(agentName);
  }

  async getStatus(): Promise<AgentStatus[]> {
    return Promise.all(
      this.agents.map(async agent => ({
        name: agent.name,
        email: agent.email,
        activeTasks: await this.readCount(agent.name),
      })),
    );
  }

  getAgents(): AgentRef[] {
    return this.agents.map(agent => ({ ...agent }));
  }

  findAgent(agentName: string): AgentRef | undefined {
    return this.agents.find(agent => agent.name === agentName);
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  // ==================== PRIVATE HELPERS ====================

  private requireAgents(): AgentRef[] {
    if (this.agents.length === 0) {
      throw new NoAgentsConfiguredError();
    }
    return this.agents;
  }

  private requireAgent(agentName: string): AgentRef {
    const agent = this.findAgent(agentName);
    if (!agent) {
      throw new UnknownAgentError(agentName);
    }
    return agent;
  }

  private async claim(agents: AgentRef[], taskId: string): Promise<AgentRef> {
    const index = await this.store.claimLeast(
      agents.map(candidate => this.counterOf(candidate.name)),
      taskId,
      this.retentionSeconds,
    );
    const agent = agents[index];
    if (!agent) {
      throw new RegistryError(`Store returned agent index ${index} for a pool of ${agents.length}`);
    }
    return agent;
  }

  private counterOf(agentName: string): TrackedCounter {
    return { counterKey: StoreKeys.activeTasks(agentName), setKey: StoreKeys.agentTasks(agentName) };
  }

  private leastBusy(agents: AgentRef[], counts: number[]): AgentRef {
    let best = 0;
    counts.forEach((count, index) => {
      if (count < (counts[best] ?? 0)) best = index;
    });
    const agent = agents[best];
    if (!agent) {
      throw new NoAgentsConfiguredError();
    }
    return agent;
  }

  private async readCount(agentName: string): Promise<number> {
    return parseCount(await this.store.get(StoreKeys.activeTasks(agentName)));
  }

  private nextRoundRobin(agents: AgentRef[]): AgentRef {
    const agent = agents[this.cursor % agents.length];
    this.cursor = (this.cursor + 1) % agents.length;
    if (!agent) {
      throw new NoAgentsConfiguredError();
    }
    return agent;
  }

  private enterDegradedMode(error: StoreUnavailableError): void {
    if (this.degraded) return;
    this.degraded = true;
    this.logger.warn(`Coordination store unreachable, using round-robin selection: ${error.message}`);
    this.eventBus?.publish({
      type: 'registry.degraded',
      timestamp: Date.now(),
      source: 'agent_registry',
      payload: { reason: error.message },
    });
  }

  private leaveDegradedMode(): void {
    if (!this.degraded) return;
    this.degraded = false;
    this.logger.info('Coordination store reachable again, least-busy selection restored');
    this.eventBus?.publish({
      type: 'registry.recovered',
      timestamp: Date.now(),
      source: 'agent_registry',
      payload: {},
    });
  }
}
