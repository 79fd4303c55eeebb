import type { Redis } from 'ioredis';
import { RedisCoordinationStore } from './redis_coordination_store';
import { StoreError, StoreUnavailableError } from '../errors';

function createMockClient() {
  return {
    get: jest.fn(),
    set: jest.fn(),
    del: jest.fn(),
    expire: jest.fn(),
    eval: jest.fn(),
    lrange: jest.fn(),
    llen: jest.fn(),
    ping: jest.fn(),
  };
}

function replyError(message: string): Error {
  const error = new Error(message);
  error.name = 'ReplyError';
  return error;
}

describe('RedisCoordinationStore', () => {
  let client: ReturnType<typeof createMockClient>;
  let store: RedisCoordinationStore;

  beforeEach(() => {
    client = createMockClient();
    store = new RedisCoordinationStore(client as unknown as Redis);
  });

  it('should set with EX when a TTL is given', async () => {
    client.set.mockResolvedValue('OK');

    await store.set('cancel:C1_1.0', '{}', 86400);
    await store.set('plain', 'v');

    expect(client.set).toHaveBeenNthCalledWith(1, 'cancel:C1_1.0', '{}', 'EX', 86400);
    expect(client.set).toHaveBeenNthCalledWith(2, 'plain', 'v');
  });

  it('should pass keys, values and TTL to the setAllIfAbsent script', async () => {
    client.eval.mockResolvedValue(1);

    const written = await store.setAllIfAbsent(
      [{ key: 'thread_tasks:1.0', value: 'C1_1.0' }, { key: 'task_threads:C1_1.0', value: '1.0' }],
      86400,
    );

    expect(written).toBe(true);
    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining("redis.call('EXISTS'"),
      2,
      'thread_tasks:1.0',
      'task_threads:C1_1.0',
      'C1_1.0',
      '1.0',
      '86400',
      '2',
    );
  });

  it('should append the released marker and discard keys when reclaiming', async () => {
    client.eval.mockResolvedValue(1);

    await store.setAllIfAbsent([{ key: 'thread_tasks:1.0', value: 'C1_2.0' }], 86400, {
      releasedKey: 'thread_released:1.0',
      discardKeys: ['thread_messages:1.0'],
    });

    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining('current ~= released'),
      3,
      'thread_tasks:1.0',
      'thread_released:1.0',
      'thread_messages:1.0',
      'C1_2.0',
      '86400',
      '1',
    );
  });

  it('should return false when setAllIfAbsent finds an existing key', async () => {
    client.eval.mockResolvedValue(0);

    await expect(store.setAllIfAbsent([{ key: 'a', value: '1' }], 10)).resolves.toBe(false);
  });

  it('should skip the round trip for empty entry lists', async () => {
    await expect(store.setAllIfAbsent([], 10)).resolves.toBe(true);
    await expect(store.claimLeast([], 'C1_1.0')).resolves.toBe(-1);
    await store.delete();

    expect(client.eval).not.toHaveBeenCalled();
    expect(client.del).not.toHaveBeenCalled();
  });

  it('should pass counters, then their sets, to the claimLeast script', async () => {
    client.eval.mockResolvedValue(1);

    const index = await store.claimLeast(
      [
        { counterKey: 'active_tasks:a', setKey: 'agent_tasks:a' },
        { counterKey: 'active_tasks:b', setKey: 'agent_tasks:b' },
      ],
      'C1_1.0',
      86400,
    );

    expect(index).toBe(1);
    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining("redis.call('SADD', KEYS[count + best], ARGV[1])"),
      4,
      'active_tasks:a',
      'active_tasks:b',
      'agent_tasks:a',
      'agent_tasks:b',
      'C1_1.0',
      '86400',
    );
  });

  it('should send an empty TTL argument when none is given', async () => {
    client.eval.mockResolvedValue(1);

    await expect(store.trackMember({ counterKey: 'c', setKey: 's' }, 'm')).resolves.toBe(true);
    expect(client.eval).toHaveBeenCalledWith(expect.any(String), 2, 'c', 's', 'm', '');
  });

  it('should translate untrackMember replies into booleans', async () => {
    client.eval.mockResolvedValueOnce(1).mockResolvedValueOnce(0);
    const counter = { counterKey: 'active_tasks:a', setKey: 'agent_tasks:a' };

    await expect(store.untrackMember(counter, 't1')).resolves.toBe(true);
    await expect(store.untrackMember(counter, 't1')).resolves.toBe(false);
    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining("redis.call('SREM', KEYS[2], ARGV[1])"),
      2,
      'active_tasks:a',
      'agent_tasks:a',
      't1',
    );
  });

  it('should wrap connection failures in StoreUnavailableError', async () => {
    client.get.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6379'));

    const error = await store.get('k').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toHaveProperty('operation', 'get');
    expect(error).toHaveProperty(
      'message',
      'Coordination store unavailable during get: connect ECONNREFUSED 127.0.0.1:6379',
    );
  });

  it('should surface command errors as StoreError without marking the store unavailable', async () => {
    client.lrange.mockRejectedValue(replyError('WRONGTYPE Operation against a key holding the wrong kind of value'));

    const error = await store.range('k', 0, -1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).not.toBeInstanceOf(StoreUnavailableError);
  });

  it('should reject non-integer script replies', async () => {
    client.eval.mockResolvedValue('OK');

    await expect(store.append('l', 'x')).rejects.toThrow('append returned a non-integer reply');
  });
});
