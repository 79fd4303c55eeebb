/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({
 *   agents: [{ name: 'rex', displayName: 'Rex', email: 'rex@example.com' }],
 *   github: { owner: 'acme', repo: 'web' },
 * });
 * const config = await new ConfigManager(configStore, {}).load();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  constructor(config: unknown = null) {
    this.config = config;
  }

  async loadConfig(): Promise<unknown> {
    return this.config;
  }

  describe(): string {
    return 'memory';
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (accepts null to clear)
   */
  setConfig(config: unknown): void {
    this.config = config;
  }

  clear(): void {
    this.config = null;
  }
}
