/**
 * Builds an ioredis client from the store configuration.
 *
 * The client connects on its first command, and the configured key prefix
 * namespaces every key the store and the queue touch. The queue blocks its
 * connection on BRPOP, so call this once per backend.
 *
 * @example
 * ```typescript
 * const store = new RedisCoordinationStore(createRedisClient(config.store));
 * const queue = new RedisTaskQueue(createRedisClient(config.store));
 * ```
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { StoreConfig } from '../../config_manager/config_manager.types';

export function redisOptionsFor(store: Pick<StoreConfig, 'keyPrefix'>): RedisOptions {
  return { keyPrefix: store.keyPrefix, lazyConnect: true };
}

export function createRedisClient(store: Pick<StoreConfig, 'url' | 'keyPrefix'>): Redis {
  const options = redisOptionsFor(store);
  return store.url ? new Redis(store.url, options) : new Redis(options);
}
