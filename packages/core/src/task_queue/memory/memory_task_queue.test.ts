import { MemoryTaskQueue } from './memory_task_queue';
import { InvalidTaskMessageError } from '../errors';
import type { TaskMessage } from '../task_queue.types';

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

describe('MemoryTaskQueue', () => {
  let queue: MemoryTaskQueue;

  beforeEach(() => {
    queue = new MemoryTaskQueue();
  });

  afterEach(() => {
    queue.clear();
  });

  it('should hand out messages in FIFO order', async () => {
    await queue.enqueue(createMessage('C1_1'));
    await queue.enqueue(createMessage('C1_2'));

    expect(await queue.size()).toBe(2);
    expect((await queue.dequeue(0))?.task_id).toBe('C1_1');
    expect((await queue.dequeue(0))?.task_id).toBe('C1_2');
    expect(await queue.size()).toBe(0);
  });

  it('should resolve a waiting dequeue when a message arrives', async () => {
    const pending = queue.dequeue(5000);

    await queue.enqueue(createMessage('C1_1'));

    await expect(pending).resolves.toEqual(createMessage('C1_1'));
    expect(await queue.size()).toBe(0);
  });

  it('should resolve null once the timeout passes', async () => {
    await expect(queue.dequeue(10)).resolves.toBeNull();
    await expect(queue.dequeue(0)).resolves.toBeNull();
  });

  it('should serve concurrent waiters one message each', async () => {
    const first = queue.dequeue(5000);
    const second = queue.dequeue(5000);

    await queue.enqueue(createMessage('C1_1'));
    await queue.enqueue(createMessage('C1_2'));

    expect((await first)?.task_id).toBe('C1_1');
    expect((await second)?.task_id).toBe('C1_2');
  });

  it('should reject messages that fail the schema', async () => {
    const invalid = { ...createMessage('C1_1'), agent_email: 'not-an-email' };

    const rejection = queue.enqueue(invalid);

    await expect(rejection).rejects.toThrow(InvalidTaskMessageError);
    await expect(rejection).rejects.toMatchObject({ errors: ['/agent_email must match format "email"'] });
    expect(await queue.size()).toBe(0);
  });

  it('should release pending waiters with null on clear', async () => {
    const pending = queue.dequeue(5000);

    queue.clear();

    await expect(pending).resolves.toBeNull();
  });
});
