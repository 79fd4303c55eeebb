import { CancellationController, buildPartialReport } from './cancellation_controller';
import { MemoryCoordinationStore } from '../coordination_store/memory';
import type { Logger } from '../logger';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

const TASK_ID = 'C123_1700000000.000100';

describe('CancellationController', () => {
  let now: number;
  let store: MemoryCoordinationStore;
  let controller: CancellationController;

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new MemoryCoordinationStore({ now: () => now });
    controller = new CancellationController({ store, logger: createMockLogger(), now: () => now });
  });

  describe('requestCancel', () => {
    it('should set the flag with actor and timestamp', async () => {
      const info = await controller.requestCancel(TASK_ID, { id: 'U1', name: 'Ana' });

      expect(info).toEqual({ actorId: 'U1', actorName: 'Ana', requestedAt: 1_700_000_000_000 });
      expect(await controller.isCancelled(TASK_ID)).toEqual(info);
      expect(store.snapshot()).toEqual({ [`cancel:${TASK_ID}`]: 86400 });
    });

    it('should keep the first request when cancelled twice', async () => {
      await controller.requestCancel(TASK_ID, { id: 'U1', name: 'Ana' });
      now += 5000;

      const second = await controller.requestCancel(TASK_ID, { id: 'U2', name: 'Bo' });

      expect(second).toEqual({ actorId: 'U1', actorName: 'Ana', requestedAt: 1_700_000_000_000 });
    });

    it('should replace an unreadable flag', async () => {
      await store.set(`cancel:${TASK_ID}`, 'garbage');

      const info = await controller.requestCancel(TASK_ID, { id: 'U2', name: 'Bo' });

      expect(info.actorName).toBe('Bo');
      expect(await controller.isCancelled(TASK_ID)).toEqual(info);
    });
  });

  describe('isCancelled', () => {
    it('should return null for tasks never cancelled', async () => {
      expect(await controller.isCancelled(TASK_ID)).toBeNull();
    });

    it('should return null once cleared', async () => {
      await controller.requestCancel(TASK_ID, { id: 'U1', name: 'Ana' });
      await controller.recordProgress(TASK_ID, { phase: 'TESTING', completedPhases: ['PLANNING'], updatedAt: now });

      await controller.clear(TASK_ID);

      expect(await controller.isCancelled(TASK_ID)).toBeNull();
      expect(await controller.lastProgress(TASK_ID)).toBeNull();
    });
  });

  describe('progress', () => {
    it('should return the last recorded snapshot', async () => {
      await controller.recordProgress(TASK_ID, { phase: 'PLANNING', completedPhases: ['PLANNING'], updatedAt: 1 });
      await controller.recordProgress(TASK_ID, {
        phase: 'DRAFT_OPENED',
        completedPhases: ['PLANNING', 'DRAFT_OPENED'],
        pullRequestUrl: 'https://github.com/acme/web/pull/7',
        updatedAt: 2,
      });

      expect(await controller.lastProgress(TASK_ID)).toEqual({
        phase: 'DRAFT_OPENED',
        completedPhases: ['PLANNING', 'DRAFT_OPENED'],
        pullRequestUrl: 'https://github.com/acme/web/pull/7',
        updatedAt: 2,
      });
    });

    it('should ignore snapshots with unknown phases', async () => {
      await store.set(`progress:${TASK_ID}`, JSON.stringify({ phase: 'DANCING', completedPhases: [], updatedAt: 1 }));

      expect(await controller.lastProgress(TASK_ID)).toBeNull();
    });
  });

  describe('buildPartialReport', () => {
    const info = { actorId: 'U1', actorName: 'Ana', requestedAt: 0 };

    it('should split phases for a cancellation observed after SELF_REVIEW', () => {
      const report = buildPartialReport(
        ['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW'],
        info,
        1000,
        126_000,
      );

      expect(report).toEqual({
        completed: ['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW'],
        notCompleted: ['TESTING', 'FINALIZING'],
        cancelledBy: 'Ana',
        elapsedMs: 125_000,
      });
    });

    it('should list phases in lifecycle order whatever the input order', () => {
      const report = controller.buildPartialReport(['DRAFT_OPENED', 'PLANNING'], info, now, now);

      expect(report.completed).toEqual(['PLANNING', 'DRAFT_OPENED']);
      expect(report.notCompleted).toEqual(['IMPLEMENTING', 'SELF_REVIEW', 'TESTING', 'FINALIZING']);
      expect(report.elapsedMs).toBe(0);
    });
  });
});
