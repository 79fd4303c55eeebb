import type { CoordinationStore } from '../coordination_store';
import type { Logger } from '../logger';
import type { TaskPhase, WorkPhase } from '../task_machine/task_machine.types';

export type CancellationActor = {
  id: string;
  name: string;
};

export type CancellationInfo = {
  actorId: string;
  actorName: string;
  /** Epoch milliseconds */
  requestedAt: number;
};

/**
 * Last known progress of a running task, written after every phase.
 */
export type ProgressSnapshot = {
  phase: TaskPhase;
  completedPhases: WorkPhase[];
  pullRequestUrl?: string;
  updatedAt: number;
};

export type PartialReport = {
  completed: WorkPhase[];
  notCompleted: WorkPhase[];
  cancelledBy: string;
  elapsedMs: number;
};

export type CancellationControllerDependencies = {
  store: CoordinationStore;
  logger?: Logger;
  /** TTL of the flag and the progress snapshot (default: 24h) */
  retentionSeconds?: number;
  now?: () => number;
};

export interface ICancellationController {
  requestCancel(taskId: string, actor: CancellationActor): Promise<CancellationInfo>;
  isCancelled(taskId: string): Promise<CancellationInfo | null>;
  clear(taskId: string): Promise<void>;
  recordProgress(taskId: string, snapshot: ProgressSnapshot): Promise<void>;
  lastProgress(taskId: string): Promise<ProgressSnapshot | null>;
  buildPartialReport(
    completed: WorkPhase[],
    info: CancellationInfo,
    startedAt: number,
    now?: number,
  ): PartialReport;
}
