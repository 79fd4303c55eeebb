export { TaskWorker } from './task_worker';
export type { TaskExecutor, TaskWorkerDependencies, TaskWorkerResult } from './task_worker';
