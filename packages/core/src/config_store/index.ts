/**
 * ConfigStore - Configuration persistence abstraction
 *
 * IMPORTANT: This module only exports the interface.
 * For implementations, use:
 * - @leash/core/fs for FsConfigStore
 * - @leash/core/memory for MemoryConfigStore
 */

// Interface only - NO implementation re-exports
export type { ConfigStore } from './config_store';
