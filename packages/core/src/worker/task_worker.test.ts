import { TaskWorker } from './task_worker';
import { MemoryTaskQueue } from '../task_queue/memory/memory_task_queue';
import type { TaskQueue, TaskMessage } from '../task_queue/task_queue.types';
import type { TaskOutcome } from '../task_machine/task_machine.types';
import type { Logger } from '../logger';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function createMessage(taskId: string): TaskMessage {
  return {
    task_id: taskId,
    task_description: 'Add dark mode',
    branch_name: 'rex/add-dark-mode',
    agent_name: 'rex',
    agent_display_name: 'Rex',
    agent_email: 'rex@example.com',
    thread_ts: '1700000000.000100',
    channel_id: 'C1',
    requester_name: 'Ana',
    requester_profile_url: null,
    start_time: 1_700_000_000,
  };
}

function createOutcome(taskId: string): TaskOutcome {
  return {
    taskId,
    phase: 'READY',
    completedPhases: ['PLANNING', 'DRAFT_OPENED', 'IMPLEMENTING', 'SELF_REVIEW', 'TESTING', 'FINALIZING'],
    summary: { branchName: 'rex/add-dark-mode', filesTouched: ['src/theme.ts'] },
    durationMs: 1000,
  };
}

describe('TaskWorker', () => {
  let queue: MemoryTaskQueue;
  let run: jest.Mock<Promise<TaskOutcome>, [TaskMessage]>;
  let logger: jest.Mocked<Logger>;
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;
  let worker: TaskWorker;

  beforeEach(() => {
    queue = new MemoryTaskQueue();
    run = jest.fn(async (message: TaskMessage) => createOutcome(message.task_id));
    logger = createMockLogger();
    sleep = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
    worker = new TaskWorker({ queue, runner: { run }, logger, dequeueTimeoutMs: 10, sleep });
  });

  afterEach(async () => {
    await worker.stop();
    queue.clear();
  });

  describe('processNext', () => {
    it('should report idle when the queue stays empty', async () => {
      await expect(worker.processNext()).resolves.toEqual({ status: 'idle' });
      expect(run).not.toHaveBeenCalled();
    });

    it('should run the next message to its outcome', async () => {
      await queue.enqueue(createMessage('C1_1'));

      await expect(worker.processNext()).resolves.toEqual({
        status: 'processed',
        outcome: createOutcome('C1_1'),
      });
      expect(run).toHaveBeenCalledWith(createMessage('C1_1'));
      expect(logger.info).toHaveBeenCalledWith('C1_1 finished as READY');
    });

    it('should turn a runner crash into an error result', async () => {
      const crash = new Error('boom');
      run.mockRejectedValueOnce(crash);
      await queue.enqueue(createMessage('C1_1'));

      await expect(worker.processNext()).resolves.toEqual({ status: 'error', taskId: 'C1_1', error: 'boom' });
      expect(logger.error).toHaveBeenCalledWith('C1_1 crashed the runner: boom', crash);
    });

    it('should turn a dequeue failure into an error result', async () => {
      const broken: TaskQueue = {
        enqueue: jest.fn(),
        dequeue: jest.fn().mockRejectedValue(new Error('Connection is closed.')),
        size: jest.fn(),
      };
      const brokenWorker = new TaskWorker({ queue: broken, runner: { run }, logger });

      await expect(brokenWorker.processNext()).resolves.toEqual({ status: 'error', error: 'Connection is closed.' });
      expect(logger.warn).toHaveBeenCalledWith('Dequeue failed: Connection is closed.');
    });

    it('should refuse to take a second task while one is in hand', async () => {
      let finish: () => void = () => undefined;
      run.mockImplementationOnce(
        message =>
          new Promise(resolve => {
            finish = () => resolve(createOutcome(message.task_id));
          }),
      );
      await queue.enqueue(createMessage('C1_1'));
      await queue.enqueue(createMessage('C1_2'));

      const first = worker.processNext();
      await new Promise(resolve => setImmediate(resolve));

      await expect(worker.processNext()).resolves.toEqual({ status: 'busy' });
      finish();
      await expect(first).resolves.toMatchObject({ status: 'processed' });
      expect(await queue.size()).toBe(1);
    });
  });

  describe('start / stop', () => {
    it('should process queued tasks in order until stopped', async () => {
      const seen: string[] = [];
      const done = new Promise<void>(resolve => {
        run.mockImplementation(async message => {
          seen.push(message.task_id);
          if (seen.length === 2) resolve();
          return createOutcome(message.task_id);
        });
      });
      await queue.enqueue(createMessage('C1_1'));
      await queue.enqueue(createMessage('C1_2'));

      worker.start();
      expect(worker.isRunning()).toBe(true);
      await done;
      await worker.stop();

      expect(seen).toEqual(['C1_1', 'C1_2']);
      expect(worker.isRunning()).toBe(false);
    });

    it('should keep going after a task crashes', async () => {
      const done = new Promise<void>(resolve => {
        run
          .mockRejectedValueOnce(new Error('boom'))
          .mockImplementationOnce(async message => {
            resolve();
            return createOutcome(message.task_id);
          });
      });
      await queue.enqueue(createMessage('C1_1'));
      await queue.enqueue(createMessage('C1_2'));

      worker.start();
      await done;
      await worker.stop();

      expect(run).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(5000, expect.any(AbortSignal));
    });

    it('should ignore a second start', async () => {
      worker.start();
      worker.start();
      await worker.stop();

      expect(logger.info).toHaveBeenCalledTimes(2);
      expect(logger.info).toHaveBeenNthCalledWith(1, 'Worker started');
      expect(logger.info).toHaveBeenNthCalledWith(2, 'Worker stopped');
    });
  });
});
