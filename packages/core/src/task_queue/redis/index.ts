export { RedisTaskQueue } from './redis_task_queue';
