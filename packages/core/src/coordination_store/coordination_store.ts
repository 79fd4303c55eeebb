/**
 * CoordinationStore - Shared key-value/list store abstraction
 *
 * Every piece of state that more than one worker process must observe
 * (agent load counters, thread↔task mappings, feedback logs, read pointers,
 * cancellation flags) goes through this interface. Implementations must make
 * each operation atomic on the backing store; callers never read-then-write.
 *
 * Implementations:
 * - RedisCoordinationStore: ioredis + Lua scripts (production)
 * - MemoryCoordinationStore: in-process maps (tests, single-process runs)
 *
 * Keys are passed un-prefixed; the backend applies its namespace.
 */

export type StoreEntry = {
  key: string;
  value: string;
};

/**
 * Lets `setAllIfAbsent` replace a binding that its holder has released.
 */
export type ReclaimOptions = {
  /** Holds the value of a released binding; entries holding that value count as absent */
  releasedKey: string;
  /** Deleted together with `releasedKey` when a released binding is replaced */
  discardKeys?: string[];
};

/**
 * A load counter paired with the set of members it counts. The counter
 * only moves when the set changes, in the same atomic step.
 */
export type TrackedCounter = {
  counterKey: string;
  setKey: string;
};

export interface CoordinationStore {
  /** Returns the string at key, or null when missing or expired. */
  get(key: string): Promise<string | null>;

  /** Writes a string, replacing any value. TTL is optional. */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;

  /**
   * Writes every entry only if none of the keys exist. All entries share
   * the TTL. With `reclaim`, a key holding the released value counts as
   * absent, and a successful write deletes the released marker and the
   * discard keys.
   */
  setAllIfAbsent(entries: StoreEntry[], ttlSeconds: number, reclaim?: ReclaimOptions): Promise<boolean>;

  delete(...keys: string[]): Promise<void>;

  /** Refreshes the TTL of an existing key. Returns false when the key is missing. */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  /**
   * Atomically records `member` against the counter with the smallest value
   * (earliest on ties), increments that counter and returns its index.
   * A member already held by one of the counters keeps its place and
   * nothing changes. Returns -1 for an empty list.
   */
  claimLeast(counters: TrackedCounter[], member: string, ttlSeconds?: number): Promise<number>;

  /** Adds a member and increments the counter when it was not present. Returns true when added. */
  trackMember(counter: TrackedCounter, member: string, ttlSeconds?: number): Promise<boolean>;

  /** Removes a member and decrements the counter (never below zero) when it was present. */
  untrackMember(counter: TrackedCounter, member: string): Promise<boolean>;

  /** Appends to the list at key and returns the new length. */
  append(key: string, value: string, ttlSeconds?: number): Promise<number>;

  /** Inclusive range with negative indexes counting from the end. */
  range(key: string, start: number, stop: number): Promise<string[]>;

  length(key: string): Promise<number>;

  /**
   * Atomically sets the integer at key to max(current, value) and returns
   * the previous value (0 when missing).
   */
  advanceTo(key: string, value: number, ttlSeconds?: number): Promise<number>;

  /** Resolves when the backend is reachable, rejects with StoreUnavailableError otherwise. */
  ping(): Promise<void>;
}
