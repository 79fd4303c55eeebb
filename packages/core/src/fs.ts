/**
 * Filesystem-backed implementations for @leash/core/fs
 */

export { FsConfigStore, createConfigManager, DEFAULT_CONFIG_FILE } from './config_store/fs';
