export { MemoryTaskQueue } from './memory_task_queue';
