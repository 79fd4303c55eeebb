export { RedisCoordinationStore } from './redis_coordination_store';
export { createRedisClient, redisOptionsFor } from './redis_client';
