/**
 * CoordinationStore - shared state abstraction
 *
 * IMPORTANT: This module only exports the interface, key layout and errors.
 * For implementations, use:
 * - @leash/core/memory for MemoryCoordinationStore
 * - @leash/core/redis for RedisCoordinationStore
 */

export type { CoordinationStore, ReclaimOptions, StoreEntry, TrackedCounter } from './coordination_store';
export { StoreKeys, DEFAULT_RETENTION_SECONDS } from './keys';
export { StoreError, StoreUnavailableError, WrongValueTypeError } from './errors';
