import { AgentRegistry } from './agent_registry';
import { NoAgentsConfiguredError, UnknownAgentError } from './errors';
import { MemoryCoordinationStore } from '../coordination_store/memory';
import { StoreUnavailableError } from '../coordination_store';
import { EventBus } from '../event_bus';
import type { LeashEvent } from '../event_bus';
import type { AgentConfig } from '../config_manager';
import type { Logger } from '../logger';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function agent(name: string): AgentConfig {
  return { name, displayName: name.toUpperCase(), email: `${name}@example.com` };
}

describe('AgentRegistry', () => {
  let store: MemoryCoordinationStore;
  let logger: jest.Mocked<Logger>;
  let eventBus: EventBus;
  let events: LeashEvent['type'][];

  function createRegistry(agents: AgentConfig[]): AgentRegistry {
    return new AgentRegistry({ agents, store, eventBus, logger });
  }

  beforeEach(() => {
    store = new MemoryCoordinationStore();
    logger = createMockLogger();
    eventBus = new EventBus(createMockLogger());
    events = [];
    eventBus.subscribeToAll(event => {
      events.push(event.type);
    });
  });

  describe('selectAgent', () => {
    it('should pick the least busy agent and count it busy afterwards', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);
      await registry.markBusy('b', 'C1_1.0');
      await registry.markBusy('b', 'C1_2.0');

      const selected = await registry.selectAgent();
      await registry.markBusy(selected.name, 'C1_3.0');

      expect(selected.name).toBe('a');
      expect(await registry.getActiveTaskCount('a')).toBe(1);
    });

    it('should not record the selected agent as busy', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);

      const first = await registry.selectAgent();
      const second = await registry.selectAgent();

      expect([first.name, second.name]).toEqual(['a', 'a']);
      expect((await registry.getStatus()).map(s => s.activeTasks)).toEqual([0, 0]);
    });

    it('should break ties by configuration order', async () => {
      const registry = createRegistry([agent('c'), agent('a'), agent('b')]);

      expect((await registry.selectAgent()).name).toBe('c');
    });

    it('should throw NoAgentsConfiguredError for an empty pool', async () => {
      const registry = createRegistry([]);

      await expect(registry.selectAgent()).rejects.toBeInstanceOf(NoAgentsConfiguredError);
      await expect(registry.assign('C1_1.0')).rejects.toThrow('No agents configured');
    });
  });

  describe('assign', () => {
    it('should keep every counter at or below ceil(N/K) under concurrent assignment', async () => {
      const registry = createRegistry([agent('a'), agent('b'), agent('c')]);
      const taskIds = Array.from({ length: 7 }, (_, i) => `C1_${i}.0`);

      await Promise.all(taskIds.map(taskId => registry.assign(taskId)));

      const status = await registry.getStatus();
      expect(status.map(s => s.activeTasks)).toEqual([3, 2, 2]);
      expect(Math.max(...status.map(s => s.activeTasks))).toBeLessThanOrEqual(Math.ceil(7 / 3));
    });

    it('should not count the same task twice', async () => {
      const registry = createRegistry([agent('a')]);

      await registry.assign('C1_1.0');
      await registry.assign('C1_1.0');

      expect(await registry.getActiveTaskCount('a')).toBe(1);
    });

    it('should return the agent that already holds the task', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);

      const first = await registry.assign('C1_1.0');
      const again = await registry.assign('C1_1.0');

      expect(again.name).toBe(first.name);
      expect((await registry.getStatus()).map(s => s.activeTasks)).toEqual([1, 0]);
    });

    it('should give counters and task sets the retention TTL', async () => {
      const registry = createRegistry([agent('a')]);

      await registry.assign('C1_1.0');

      expect(store.snapshot()).toEqual({
        'active_tasks:a': 86400,
        'agent_tasks:a': 86400,
      });
    });
  });

  describe('markBusy / markFree', () => {
    it('should be idempotent when marking the same task busy twice', async () => {
      const registry = createRegistry([agent('a')]);

      await registry.markBusy('a', 'C1_1.0');
      await registry.markBusy('a', 'C1_1.0');

      expect(await registry.getActiveTaskCount('a')).toBe(1);
    });

    it('should never drive a counter below zero when freeing twice', async () => {
      const registry = createRegistry([agent('a')]);
      await registry.markBusy('a', 'C1_1.0');

      await registry.markFree('a', 'C1_1.0');
      await registry.markFree('a', 'C1_1.0');
      await registry.markFree('a', 'C1_never.0');

      expect(await registry.getActiveTaskCount('a')).toBe(0);
    });

    it('should only release the task being freed', async () => {
      const registry = createRegistry([agent('a')]);
      await registry.markBusy('a', 'C1_1.0');
      await registry.markBusy('a', 'C1_2.0');

      await registry.markFree('a', 'C1_1.0');
      await registry.markFree('a', 'C1_1.0');

      expect(await registry.getActiveTaskCount('a')).toBe(1);
    });

    it('should reject unknown agents', async () => {
      const registry = createRegistry([agent('a')]);

      await expect(registry.markBusy('ghost', 'C1_1.0')).rejects.toBeInstanceOf(UnknownAgentError);
      await expect(registry.markFree('ghost', 'C1_1.0')).rejects.toThrow('Unknown agent: ghost');
    });
  });

  describe('store failures', () => {
    it('should record the task and its load in a single store operation', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);
      const claim = jest.spyOn(store, 'claimLeast');
      const track = jest.spyOn(store, 'trackMember');

      await registry.assign('C1_1.0');

      expect(claim).toHaveBeenCalledTimes(1);
      expect(claim).toHaveBeenCalledWith(
        [
          { counterKey: 'active_tasks:a', setKey: 'agent_tasks:a' },
          { counterKey: 'active_tasks:b', setKey: 'agent_tasks:b' },
        ],
        'C1_1.0',
        86400,
      );
      expect(track).not.toHaveBeenCalled();
    });

    it('should leave no load behind when the claim fails', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);
      jest
        .spyOn(store, 'claimLeast')
        .mockRejectedValueOnce(new StoreUnavailableError('claimLeast', 'connection reset'));

      const assigned = await registry.assign('C1_1.0');
      await registry.markFree(assigned.name, 'C1_1.0');

      expect(assigned.name).toBe('a');
      expect((await registry.getStatus()).map(s => s.activeTasks)).toEqual([0, 0]);
    });

    it('should release the load on a later markFree when a release fails', async () => {
      const registry = createRegistry([agent('a')]);
      await registry.assign('C1_1.0');
      jest
        .spyOn(store, 'untrackMember')
        .mockRejectedValueOnce(new StoreUnavailableError('untrackMember', 'connection reset'));

      await registry.markFree('a', 'C1_1.0');
      expect(await registry.getActiveTaskCount('a')).toBe(1);

      await registry.markFree('a', 'C1_1.0');
      expect(await registry.getActiveTaskCount('a')).toBe(0);
    });
  });

  describe('degraded mode', () => {
    it('should fall back to round-robin while the store is unreachable', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);
      store.setUnavailable(true);

      const names = [
        (await registry.assign('C1_1.0')).name,
        (await registry.assign('C1_2.0')).name,
        (await registry.selectAgent()).name,
      ];

      expect(names).toEqual(['a', 'b', 'a']);
      expect(registry.isDegraded()).toBe(true);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'Coordination store unreachable, using round-robin selection: Coordination store unavailable during claimLeast: simulated outage',
      );
    });

    it('should recover automatically once the store answers', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);
      store.setUnavailable(true);
      await registry.assign('C1_1.0');
      store.setUnavailable(false);

      const selected = await registry.assign('C1_2.0');
      await eventBus.waitForIdle();

      expect(selected.name).toBe('a');
      expect(registry.isDegraded()).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Coordination store reachable again, least-busy selection restored');
      expect(events).toEqual(['registry.degraded', 'registry.recovered']);
    });

    it('should log instead of throwing when marking agents while degraded', async () => {
      const registry = createRegistry([agent('a')]);
      store.setUnavailable(true);

      await expect(registry.markBusy('a', 'C1_1.0')).resolves.toBeUndefined();
      await expect(registry.markFree('a', 'C1_1.0')).resolves.toBeUndefined();

      expect(logger.warn).toHaveBeenCalledWith('Could not mark a busy with C1_1.0 while degraded');
      expect(logger.warn).toHaveBeenCalledWith('Could not mark a free of C1_1.0 while degraded');
    });
  });

  describe('queries', () => {
    it('should report status for every agent in configuration order', async () => {
      const registry = createRegistry([agent('a'), agent('b')]);
      await registry.markBusy('b', 'C1_1.0');

      expect(await registry.getStatus()).toEqual([
        { name: 'a', email: 'a@example.com', activeTasks: 0 },
        { name: 'b', email: 'b@example.com', activeTasks: 1 },
      ]);
    });

    it('should find agents by name and return copies of the pool', () => {
      const registry = createRegistry([agent('a')]);

      expect(registry.findAgent('a')?.displayName).toBe('A');
      expect(registry.findAgent('zz')).toBeUndefined();

      const pool = registry.getAgents();
      pool.push(agent('x'));
      expect(registry.getAgents()).toHaveLength(1);
    });
  });
});
