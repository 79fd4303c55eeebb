export { MemoryCoordinationStore } from './memory_coordination_store';
export type { MemoryCoordinationStoreOptions } from './memory_coordination_store';
