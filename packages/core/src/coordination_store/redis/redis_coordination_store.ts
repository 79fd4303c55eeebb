/**
 * RedisCoordinationStore - Redis implementation of CoordinationStore
 *
 * Uses ioredis. Compound operations (check-then-write, counter plus member
 * set updates, least-loaded claim, monotonic pointer advance) run as Lua
 * scripts so each one is a single atomic step on the server.
 *
 * The namespace prefix is applied by ioredis itself (`keyPrefix` client
 * option), including the KEYS passed to scripts.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * const client = new Redis(config.store.url, { keyPrefix: config.store.keyPrefix });
 * const store = new RedisCoordinationStore(client);
 * ```
 */

import type { Redis } from 'ioredis';
import type { CoordinationStore, ReclaimOptions, StoreEntry, TrackedCounter } from '../coordination_store';
import { StoreError, StoreUnavailableError } from '../errors';

// ==================== Lua Scripts ====================

// KEYS: entries, then the released marker and discard keys when reclaiming.
// ARGV: entry values, TTL, entry count.
const SET_ALL_IF_ABSENT = `
local count = tonumber(ARGV[#ARGV])
local ttl = ARGV[#ARGV - 1]
local released = false
if #KEYS > count then released = redis.call('GET', KEYS[count + 1]) end
for i = 1, count do
  local current = redis.call('GET', KEYS[i])
  if current and current ~= released then return 0 end
end
for i = 1, count do
  redis.call('SET', KEYS[i], ARGV[i], 'EX', ttl)
end
if released then
  for i = count + 1, #KEYS do redis.call('DEL', KEYS[i]) end
end
return 1
`;

// KEYS: counters, then their sets in the same order. ARGV: member, TTL.
const CLAIM_LEAST = `
local count = #KEYS / 2
for i = 1, count do
  if redis.call('SISMEMBER', KEYS[count + i], ARGV[1]) == 1 then return i - 1 end
end
local best = -1
local bestValue = nil
for i = 1, count do
  local value = tonumber(redis.call('GET', KEYS[i]) or '0')
  if bestValue == nil or value < bestValue then
    bestValue = value
    best = i
  end
end
if best == -1 then return -1 end
redis.call('SADD', KEYS[count + best], ARGV[1])
redis.call('INCR', KEYS[best])
if ARGV[2] ~= '' then
  redis.call('EXPIRE', KEYS[best], ARGV[2])
  redis.call('EXPIRE', KEYS[count + best], ARGV[2])
end
return best - 1
`;

// KEYS: counter, set. ARGV: member, TTL.
const TRACK_MEMBER = `
local added = redis.call('SADD', KEYS[2], ARGV[1])
if added == 1 then redis.call('INCR', KEYS[1]) end
if ARGV[2] ~= '' then
  redis.call('EXPIRE', KEYS[1], ARGV[2])
  redis.call('EXPIRE', KEYS[2], ARGV[2])
end
return added
`;

// KEYS: counter, set. ARGV: member.
const UNTRACK_MEMBER = `
local removed = redis.call('SREM', KEYS[2], ARGV[1])
if removed == 1 then
  local value = tonumber(redis.call('GET', KEYS[1]) or '0')
  if value > 0 then redis.call('DECR', KEYS[1]) end
  if value < 0 then redis.call('SET', KEYS[1], 0, 'KEEPTTL') end
end
return removed
`;

const ADVANCE_TO = `
local previous = tonumber(redis.call('GET', KEYS[1]) or '0')
local target = tonumber(ARGV[1])
if target > previous then redis.call('SET', KEYS[1], target, 'KEEPTTL') end
if ARGV[2] ~= '' then redis.call('EXPIRE', KEYS[1], ARGV[2]) end
return previous
`;

const APPEND = `
local length = redis.call('RPUSH', KEYS[1], ARGV[1])
if ARGV[2] ~= '' then redis.call('EXPIRE', KEYS[1], ARGV[2]) end
return length
`;

/**
 * Redis replies with a ReplyError for command-level failures (wrong type,
 * script errors). Anything else means the connection itself is unusable.
 */
function isReplyError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ReplyError';
}

function ttlArg(ttlSeconds: number | undefined): string {
  return ttlSeconds === undefined ? '' : String(Math.ceil(ttlSeconds));
}

export class RedisCoordinationStore implements CoordinationStore {
  constructor(private readonly client: Redis) {}

  // ==================== PRIVATE HELPERS ====================

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      if (isReplyError(error)) {
        throw new StoreError(`${operation} failed: ${message}`);
      }
      throw new StoreUnavailableError(operation, message);
    }
  }

  private async script(
    operation: string,
    source: string,
    keys: string[],
    args: string[],
  ): Promise<number> {
    const result = await this.call(operation, () =>
      this.client.eval(source, keys.length, ...keys, ...args),
    );
    if (typeof result !== 'number') {
      throw new StoreError(`${operation} returned a non-integer reply`);
    }
    return result;
  }

  // ==================== STRINGS ====================

  async get(key: string): Promise<string | null> {
    return this.call('get', () => this.client.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.call('set', () =>
      ttlSeconds === undefined
        ? this.client.set(key, value)
        : this.client.set(key, value, 'EX', Math.ceil(ttlSeconds)),
    );
  }

  async setAllIfAbsent(entries: StoreEntry[], ttlSeconds: number, reclaim?: ReclaimOptions): Promise<boolean> {
    if (entries.length === 0) return true;
    const reclaimKeys = reclaim ? [reclaim.releasedKey, ...(reclaim.discardKeys ?? [])] : [];
    const written = await this.script(
      'setAllIfAbsent',
      SET_ALL_IF_ABSENT,
      [...entries.map(entry => entry.key), ...reclaimKeys],
      [...entries.map(entry => entry.value), ttlArg(ttlSeconds), String(entries.length)],
    );
    return written === 1;
  }

  async delete(...keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    await this.call('delete', () => this.client.del(...keys));
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.call('expire', () => this.client.expire(key, Math.ceil(ttlSeconds)));
    return result === 1;
  }

  // ==================== COUNTERS ====================

  async claimLeast(counters: TrackedCounter[], member: string, ttlSeconds?: number): Promise<number> {
    if (counters.length === 0) return -1;
    return this.script(
      'claimLeast',
      CLAIM_LEAST,
      [...counters.map(counter => counter.counterKey), ...counters.map(counter => counter.setKey)],
      [member, ttlArg(ttlSeconds)],
    );
  }

  async trackMember(counter: TrackedCounter, member: string, ttlSeconds?: number): Promise<boolean> {
    const added = await this.script(
      'trackMember',
      TRACK_MEMBER,
      [counter.counterKey, counter.setKey],
      [member, ttlArg(ttlSeconds)],
    );
    return added === 1;
  }

  async untrackMember(counter: TrackedCounter, member: string): Promise<boolean> {
    const removed = await this.script('untrackMember', UNTRACK_MEMBER, [counter.counterKey, counter.setKey], [member]);
    return removed === 1;
  }

  async advanceTo(key: string, value: number, ttlSeconds?: number): Promise<number> {
    return this.script('advanceTo', ADVANCE_TO, [key], [String(value), ttlArg(ttlSeconds)]);
  }

  // ==================== LISTS ====================

  async append(key: string, value: string, ttlSeconds?: number): Promise<number> {
    return this.script('append', APPEND, [key], [value, ttlArg(ttlSeconds)]);
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    return this.call('range', () => this.client.lrange(key, start, stop));
  }

  async length(key: string): Promise<number> {
    return this.call('length', () => this.client.llen(key));
  }

  async ping(): Promise<void> {
    await this.call('ping', () => this.client.ping());
  }
}
