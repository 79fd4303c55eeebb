/**
 * MemoryCoordinationStore - In-memory implementation of CoordinationStore
 *
 * Every operation runs synchronously inside a single call, so the atomicity
 * contract holds trivially within one process. TTLs are enforced lazily on
 * access against an injectable clock.
 *
 * @example
 * ```typescript
 * let now = 0;
 * const store = new MemoryCoordinationStore({ now: () => now });
 * await store.set('thread_tasks:1.0', 'C1_1.0', 60);
 * now = 61_000;
 * expect(await store.get('thread_tasks:1.0')).toBeNull();
 * ```
 */

import type { CoordinationStore, ReclaimOptions, StoreEntry, TrackedCounter } from '../coordination_store';
import { StoreUnavailableError, WrongValueTypeError } from '../errors';

type StoredValue =
  | { kind: 'string'; value: string }
  | { kind: 'list'; items: string[] }
  | { kind: 'set'; members: Set<string> };

type Slot = {
  data: StoredValue;
  expiresAt: number | null;
};

export type MemoryCoordinationStoreOptions = {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
};

export class MemoryCoordinationStore implements CoordinationStore {
  private readonly slots = new Map<string, Slot>();
  private readonly now: () => number;
  private unavailable = false;

  constructor(options: MemoryCoordinationStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  // ==================== PRIVATE HELPERS ====================

  private guard(operation: string): void {
    if (this.unavailable) {
      throw new StoreUnavailableError(operation, 'simulated outage');
    }
  }

  private read(key: string): Slot | undefined {
    const slot = this.slots.get(key);
    if (slot && slot.expiresAt !== null && slot.expiresAt <= this.now()) {
      this.slots.delete(key);
      return undefined;
    }
    return slot;
  }

  private expiry(ttlSeconds: number | undefined, current: number | null = null): number | null {
    return ttlSeconds === undefined ? current : this.now() + ttlSeconds * 1000;
  }

  private readCounter(key: string): number {
    const slot = this.read(key);
    if (!slot) return 0;
    if (slot.data.kind !== 'string') {
      throw new WrongValueTypeError(key, 'counter');
    }
    const parsed = Number.parseInt(slot.data.value, 10);
    if (Number.isNaN(parsed)) {
      throw new WrongValueTypeError(key, 'counter');
    }
    return parsed;
  }

  private writeCounter(key: string, value: number, ttlSeconds?: number): void {
    const existing = this.read(key);
    this.slots.set(key, {
      data: { kind: 'string', value: String(value) },
      expiresAt: this.expiry(ttlSeconds, existing?.expiresAt ?? null),
    });
  }

  private readString(key: string): string | null {
    const slot = this.read(key);
    return slot && slot.data.kind === 'string' ? slot.data.value : null;
  }

  private addMember(key: string, member: string, ttlSeconds?: number): boolean {
    const slot = this.read(key);
    const members = this.readSet(key);
    if (slot && members) {
      const added = !members.has(member);
      members.add(member);
      slot.expiresAt = this.expiry(ttlSeconds, slot.expiresAt);
      return added;
    }
    this.slots.set(key, {
      data: { kind: 'set', members: new Set([member]) },
      expiresAt: this.expiry(ttlSeconds),
    });
    return true;
  }

  private readList(key: string): string[] {
    const slot = this.read(key);
    if (!slot) return [];
    if (slot.data.kind !== 'list') {
      throw new WrongValueTypeError(key, 'list');
    }
    return slot.data.items;
  }

  private readSet(key: string): Set<string> | undefined {
    const slot = this.read(key);
    if (!slot) return undefined;
    if (slot.data.kind !== 'set') {
      throw new WrongValueTypeError(key, 'set');
    }
    return slot.data.members;
  }

  // ==================== STRINGS ====================

  async get(key: string): Promise<string | null> {
    this.guard('get');
    const slot = this.read(key);
    if (!slot) return null;
    if (slot.data.kind !== 'string') {
      throw new WrongValueTypeError(key, 'string');
    }
    return slot.data.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.guard('set');
    this.slots.set(key, {
      data: { kind: 'string', value },
      expiresAt: this.expiry(ttlSeconds),
    });
  }

  async setAllIfAbsent(entries: StoreEntry[], ttlSeconds: number, reclaim?: ReclaimOptions): Promise<boolean> {
    this.guard('setAllIfAbsent');
    const released = reclaim ? this.readString(reclaim.releasedKey) : null;
    const blocked = entries.some(entry => {
      const current = this.read(entry.key);
      if (!current) return false;
      return released === null || current.data.kind !== 'string' || current.data.value !== released;
    });
    if (blocked) return false;

    for (const entry of entries) {
      this.slots.set(entry.key, {
        data: { kind: 'string', value: entry.value },
        expiresAt: this.expiry(ttlSeconds),
      });
    }
    if (reclaim && released !== null) {
      for (const key of [reclaim.releasedKey, ...(reclaim.discardKeys ?? [])]) {
        this.slots.delete(key);
      }
    }
    return true;
  }

  async delete(...keys: string[]): Promise<void> {
    this.guard('delete');
    for (const key of keys) {
      this.slots.delete(key);
    }
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    this.guard('expire');
    const slot = this.read(key);
    if (!slot) return false;
    slot.expiresAt = this.expiry(ttlSeconds);
    return true;
  }

  // ==================== COUNTERS ====================

  async claimLeast(counters: TrackedCounter[], member: string, ttlSeconds?: number): Promise<number> {
    this.guard('claimLeast');
    const holder = counters.findIndex(counter => this.readSet(counter.setKey)?.has(member) ?? false);
    if (holder !== -1) return holder;

    let bestIndex = -1;
    let bestValue = Number.POSITIVE_INFINITY;
    counters.forEach((counter, index) => {
      const value = this.readCounter(counter.counterKey);
      if (value < bestValue) {
        bestValue = value;
        bestIndex = index;
      }
    });
    const chosen = counters[bestIndex];
    if (chosen === undefined) {
      return -1;
    }
    this.addMember(chosen.setKey, member, ttlSeconds);
    this.writeCounter(chosen.counterKey, bestValue + 1, ttlSeconds);
    return bestIndex;
  }

  async trackMember(counter: TrackedCounter, member: string, ttlSeconds?: number): Promise<boolean> {
    this.guard('trackMember');
    const count = this.readCounter(counter.counterKey);
    const added = this.addMember(counter.setKey, member, ttlSeconds);
    if (added) {
      this.writeCounter(counter.counterKey, count + 1, ttlSeconds);
    }
    return added;
  }

  async untrackMember(counter: TrackedCounter, member: string): Promise<boolean> {
    this.guard('untrackMember');
    const count = this.readCounter(counter.counterKey);
    const members = this.readSet(counter.setKey);
    if (!members?.delete(member)) return false;
    if (members.size === 0) {
      this.slots.delete(counter.setKey);
    }
    if (count !== 0) {
      this.writeCounter(counter.counterKey, Math.max(0, count - 1));
    }
    return true;
  }

  async advanceTo(key: string, value: number, ttlSeconds?: number): Promise<number> {
    this.guard('advanceTo');
    const previous = this.readCounter(key);
    this.writeCounter(key, Math.max(previous, value), ttlSeconds);
    return previous;
  }

  // ==================== LISTS ====================

  async append(key: string, value: string, ttlSeconds?: number): Promise<number> {
    this.guard('append');
    const slot = this.read(key);
    if (slot && slot.data.kind !== 'list') {
      throw new WrongValueTypeError(key, 'list');
    }
    if (slot && slot.data.kind === 'list') {
      slot.data.items.push(value);
      slot.expiresAt = this.expiry(ttlSeconds, slot.expiresAt);
      return slot.data.items.length;
    }
    this.slots.set(key, {
      data: { kind: 'list', items: [value] },
      expiresAt: this.expiry(ttlSeconds),
    });
    return 1;
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    this.guard('range');
    const items = this.readList(key);
    const from = start < 0 ? Math.max(items.length + start, 0) : start;
    const to = stop < 0 ? items.length + stop : Math.min(stop, items.length - 1);
    if (from > to) return [];
    return items.slice(from, to + 1);
  }

  async length(key: string): Promise<number> {
    this.guard('length');
    return this.readList(key).length;
  }

  async ping(): Promise<void> {
    this.guard('ping');
  }

  // ==================== Test Helper Methods ====================

  /**
   * Simulate an outage: every operation rejects with StoreUnavailableError
   */
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /**
   * Live keys with their remaining TTL in seconds (null = no expiry)
   */
  snapshot(): Record<string, number | null> {
    const result: Record<string, number | null> = {};
    for (const key of Array.from(this.slots.keys())) {
      const slot = this.read(key);
      if (!slot) continue;
      result[key] = slot.expiresAt === null ? null : Math.ceil((slot.expiresAt - this.now()) / 1000);
    }
    return result;
  }

  clear(): void {
    this.slots.clear();
    this.unavailable = false;
  }
}
