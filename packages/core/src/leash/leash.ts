/**
 * createLeash - wires the engine from a resolved configuration
 *
 * Every component shares the one store, and the configuration reaches the
 * component that owns each setting:
 * - `store.retentionSeconds`: registry counters, thread mappings and
 *   feedback logs, cancellation flags and progress snapshots;
 * - `retry.delaysSeconds`: the runner's backoff for remote calls;
 * - `feedback.*`: the default wait of `awaitFeedback` and `ask`;
 * - `github.baseBranch`: the branch each task starts from;
 * - `chat.*`: mention stripping and requester profile links.
 *
 * `store.url` and `store.keyPrefix` belong to the Redis client
 * (`createRedisClient` in @leash/core/redis).
 *
 * @example
 * ```typescript
 * const config = await new ConfigManager(new FsConfigStore(root)).load();
 * const leash = createLeash(config, {
 *   store: new RedisCoordinationStore(createRedisClient(config.store)),
 *   queue: new RedisTaskQueue(createRedisClient(config.store)),
 *   chat,
 *   publisher,
 *   codingAgent,
 *   workspaces,
 * });
 * leash.worker.start();
 * ```
 */

import { AgentRegistry } from '../agent_registry/agent_registry';
import { CancellationController } from '../cancellation/cancellation_controller';
import type { LeashConfig } from '../config_manager/config_manager.types';
import { FeedbackRelay } from '../feedback_relay/feedback_relay';
import { TaskIntake } from '../task_intake/task_intake';
import { TaskRunner } from '../task_machine/task_runner';
import { TaskWorker } from '../worker/task_worker';
import type { Leash, LeashDependencies } from './leash.types';

export function createLeash(config: LeashConfig, deps: LeashDependencies): Leash {
  const { store, queue, chat, eventBus, logger, sleep, now } = deps;
  const retentionSeconds = config.store.retentionSeconds;

  const registry = new AgentRegistry({ agents: config.agents, store, retentionSeconds, eventBus, logger });
  const relay = new FeedbackRelay({ store, chat, eventBus, logger, retentionSeconds, now, sleep });
  const cancellation = new CancellationController({ store, logger, retentionSeconds, now });

  const intake = new TaskIntake({
    registry,
    relay,
    cancellation,
    queue,
    chat,
    eventBus,
    logger,
    botUserId: config.chat.botUserId,
    workspaceUrl: config.chat.workspaceUrl,
    now,
  });
  const runner = new TaskRunner({
    codingAgent: deps.codingAgent,
    workspaces: deps.workspaces,
    publisher: deps.publisher,
    chat,
    relay,
    cancellation,
    registry,
    eventBus,
    logger,
    baseBranch: config.github.baseBranch,
    retryDelaysMs: config.retry.delaysSeconds.map(seconds => seconds * 1000),
    sleep,
    now,
  });
  const worker = new TaskWorker({ queue, runner, logger, sleep });

  const feedbackWait = {
    timeoutMs: config.feedback.awaitTimeoutSeconds * 1000,
    pollIntervalMs: config.feedback.pollIntervalSeconds * 1000,
  };

  return {
    registry,
    relay,
    cancellation,
    intake,
    runner,
    worker,
    feedbackWait,
    awaitFeedback: (taskId, signal) => relay.awaitNext(taskId, { ...feedbackWait, signal }),
    ask: (taskId, thread, question, signal) => relay.ask(taskId, thread, question, { ...feedbackWait, signal }),
  };
}
