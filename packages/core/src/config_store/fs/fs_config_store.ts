/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Implements the fail-safe pattern: a missing file or invalid JSON yields
 * null instead of throwing, and ConfigManager turns that into a
 * ConfigNotFoundError.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import { ConfigManager } from '../../config_manager';
import type { ConfigEnvironment } from '../../config_manager';

export const DEFAULT_CONFIG_FILE = 'leash.config.json';

/**
 * @example
 * ```typescript
 * const store = new FsConfigStore('/srv/leash');
 * const raw = await store.loadConfig(); // reads /srv/leash/leash.config.json
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(rootPath: string, fileName: string = DEFAULT_CONFIG_FILE) {
    this.configPath = path.join(rootPath, fileName);
  }

  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch {
      return null;
    }

    try {
      return JSON.parse(content);
    } catch {
      return null;
    }
  }

  describe(): string {
    return this.configPath;
  }
}

/**
 * Create a ConfigManager reading `leash.config.json` from the given
 * directory (default: the working directory).
 */
export function createConfigManager(
  rootPath: string = process.cwd(),
  env: ConfigEnvironment = process.env,
): ConfigManager {
  return new ConfigManager(new FsConfigStore(rootPath), env);
}
