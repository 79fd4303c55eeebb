/**
 * CancellationController - cooperative per-task cancellation
 *
 * A cancellation is a one-way flag at `cancel:{task_id}` holding who asked
 * and when. The first request wins; later requests get the original back.
 * The task runner observes the flag at its next checkpoint, so the phase in
 * flight always completes before the task stops.
 *
 * The controller also keeps the last known progress of each task at
 * `progress:{task_id}`, which the partial report is built from.
 */

import { StoreKeys, DEFAULT_RETENTION_SECONDS } from '../coordination_store';
import type { CoordinationStore } from '../coordination_store';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { WORK_PHASES, isTaskPhase, isWorkPhase } from '../task_machine/phases';
import type { WorkPhase } from '../task_machine/task_machine.types';
import type {
  CancellationActor,
  CancellationControllerDependencies,
  CancellationInfo,
  ICancellationController,
  PartialReport,
  ProgressSnapshot,
} from './cancellation.types';

function parseJson(value: string | null): unknown {
  if (value === null) return null;
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCancellationInfo(value: unknown): value is CancellationInfo {
  return (
    isRecord(value) &&
    typeof value['actorId'] === 'string' &&
    typeof value['actorName'] === 'string' &&
    typeof value['requestedAt'] === 'number'
  );
}

function isProgressSnapshot(value: unknown): value is ProgressSnapshot {
  if (!isRecord(value)) return false;
  const completed = value['completedPhases'];
  const url = value['pullRequestUrl'];
  return (
    isTaskPhase(value['phase']) &&
    Array.isArray(completed) &&
    completed.every(isWorkPhase) &&
    (url === undefined || typeof url === 'string') &&
    typeof value['updatedAt'] === 'number'
  );
}

/**
 * Split the work phases into completed and not completed, in phase order.
 */
export function buildPartialReport(
  completed: WorkPhase[],
  info: CancellationInfo,
  startedAt: number,
  now: number = Date.now(),
): PartialReport {
  const done = new Set(completed);
  return {
    completed: WORK_PHASES.filter(phase => done.has(phase)),
    notCompleted: WORK_PHASES.filter(phase => !done.has(phase)),
    cancelledBy: info.actorName,
    elapsedMs: Math.max(0, now - startedAt),
  };
}

export class CancellationController implements ICancellationController {
  private readonly store: CoordinationStore;
  private readonly logger: Logger;
  private readonly retentionSeconds: number;
  private readonly now: () => number;

  constructor(deps: CancellationControllerDependencies) {
    this.store = deps.store;
    this.logger = deps.logger ?? createLogger('[Cancellation] ');
    this.retentionSeconds = deps.retentionSeconds ?? DEFAULT_RETENTION_SECONDS;
    this.now = deps.now ?? Date.now;
  }

  async requestCancel(taskId: string, actor: CancellationActor): Promise<CancellationInfo> {
    const info: CancellationInfo = { actorId: actor.id, actorName: actor.name, requestedAt: this.now() };
    const key = StoreKeys.cancellation(taskId);

    const written = await this.store.setAllIfAbsent([{ key, value: JSON.stringify(info) }], this.retentionSeconds);
    if (written) {
      this.logger.info(`Cancellation requested for ${taskId} by ${actor.name}`);
      return info;
    }

    const existing = await this.isCancelled(taskId);
    if (existing) {
      this.logger.debug(`${taskId} already cancelled by ${existing.actorName}`);
      return existing;
    }

    // The previous flag expired or was unreadable between the two calls.
    await this.store.set(key, JSON.stringify(info), this.retentionSeconds);
    return info;
  }

  async isCancelled(taskId: string): Promise<CancellationInfo | null> {
    const parsed = parseJson(await this.store.get(StoreKeys.cancellation(taskId)));
    return isCancellationInfo(parsed) ? parsed : null;
  }

  async clear(taskId: string): Promise<void> {
    await this.store.delete(StoreKeys.cancellation(taskId), StoreKeys.progress(taskId));
  }

  async recordProgress(taskId: string, snapshot: ProgressSnapshot): Promise<void> {
    await this.store.set(StoreKeys.progress(taskId), JSON.stringify(snapshot), this.retentionSeconds);
  }

  async lastProgress(taskId: string): Promise<ProgressSnapshot | null> {
    const parsed = parseJson(await this.store.get(StoreKeys.progress(taskId)));
    return isProgressSnapshot(parsed) ? parsed : null;
  }

  buildPartialReport(
    completed: WorkPhase[],
    info: CancellationInfo,
    startedAt: number,
    now: number = this.now(),
  ): PartialReport {
    return buildPartialReport(completed, info, startedAt, now);
  }
}
