/**
 * Redis implementations for @leash/core/redis
 *
 * Each implementation receives an ioredis client; the namespace comes from
 * the client's `keyPrefix` option.
 *
 * Usage:
 *   import { createRedisClient, RedisCoordinationStore, RedisTaskQueue } from '@leash/core/redis';
 *
 *   const store = new RedisCoordinationStore(createRedisClient(config.store));
 *   const queue = new RedisTaskQueue(createRedisClient(config.store));
 */

export type { Redis, RedisOptions } from 'ioredis';

export { RedisCoordinationStore, createRedisClient, redisOptionsFor } from './coordination_store/redis';
export { RedisTaskQueue } from './task_queue/redis';
