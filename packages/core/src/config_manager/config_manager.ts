/**
 * ConfigManager - Leash configuration loader
 *
 * Reads raw configuration through a ConfigStore, validates it against the
 * YAML schema, applies defaults and finally environment overrides.
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@leash/core/fs';
 * const manager = new ConfigManager(new FsConfigStore('/srv/leash'));
 * const config = await manager.load();
 *
 * // Test usage
 * import { MemoryConfigStore } from '@leash/core/memory';
 * const store = new MemoryConfigStore();
 * store.setConfig({ agents: [...], github: { owner: 'acme', repo: 'web' } });
 * const config = await new ConfigManager(store, {}).load();
 * ```
 */

import type { ConfigStore } from '../config_store/config_store';
import { SchemaValidationCache, SchemaFiles, formatSchemaErrors } from '../schemas';
import { DEFAULT_RETENTION_SECONDS } from '../coordination_store/keys';
import { ConfigNotFoundError, ConfigValidationError } from './errors';
import type {
  ConfigEnvironment,
  IConfigManager,
  LeashConfig,
  LeashConfigInput,
} from './config_manager.types';

export const DEFAULT_KEY_PREFIX = 'leash:';
export const DEFAULT_BASE_BRANCH = 'main';
export const DEFAULT_TOKEN_ENV = 'GITHUB_TOKEN';
export const DEFAULT_AWAIT_TIMEOUT_SECONDS = 600;
export const DEFAULT_POLL_INTERVAL_SECONDS = 10;
export const DEFAULT_RETRY_DELAYS_SECONDS = [60, 120, 240];

/**
 * Validate raw input and return it typed, or throw ConfigValidationError.
 */
export function validateConfig(raw: unknown): LeashConfigInput {
  const validator = SchemaValidationCache.getValidator<LeashConfigInput>(SchemaFiles.LeashConfig);
  if (!validator(raw)) {
    throw new ConfigValidationError(formatSchemaErrors(validator.errors));
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const agent of raw.agents) {
    if (seen.has(agent.name)) duplicates.add(agent.name);
    seen.add(agent.name);
  }
  if (duplicates.size > 0) {
    throw new ConfigValidationError(
      Array.from(duplicates).map(name => `/agents duplicate agent name '${name}'`),
    );
  }

  return raw;
}

/**
 * Apply defaults, then environment overrides.
 */
export function resolveConfig(input: LeashConfigInput, env: ConfigEnvironment = {}): LeashConfig {
  const config: LeashConfig = {
    agents: input.agents.map(agent => ({ ...agent })),
    store: {
      keyPrefix: input.store?.keyPrefix ?? DEFAULT_KEY_PREFIX,
      retentionSeconds: input.store?.retentionSeconds ?? DEFAULT_RETENTION_SECONDS,
      ...(input.store?.url !== undefined ? { url: input.store.url } : {}),
    },
    github: {
      owner: input.github.owner,
      repo: input.github.repo,
      baseBranch: input.github.baseBranch ?? DEFAULT_BASE_BRANCH,
      tokenEnv: input.github.tokenEnv ?? DEFAULT_TOKEN_ENV,
    },
    chat: { ...input.chat },
    feedback: {
      awaitTimeoutSeconds: input.feedback?.awaitTimeoutSeconds ?? DEFAULT_AWAIT_TIMEOUT_SECONDS,
      pollIntervalSeconds: input.feedback?.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS,
    },
    retry: {
      delaysSeconds: input.retry?.delaysSeconds ?? [...DEFAULT_RETRY_DELAYS_SECONDS],
    },
  };

  if (env.LEASH_REDIS_URL) config.store.url = env.LEASH_REDIS_URL;
  if (env.LEASH_KEY_PREFIX !== undefined) config.store.keyPrefix = env.LEASH_KEY_PREFIX;
  if (env.LEASH_BASE_BRANCH) config.github.baseBranch = env.LEASH_BASE_BRANCH;
  if (env.LEASH_GITHUB_REPO) {
    const [owner, repo, ...rest] = env.LEASH_GITHUB_REPO.split('/');
    if (!owner || !repo || rest.length > 0) {
      throw new ConfigValidationError([
        `LEASH_GITHUB_REPO must look like 'owner/repo', got '${env.LEASH_GITHUB_REPO}'`,
      ]);
    }
    config.github.owner = owner;
    config.github.repo = repo;
  }

  return config;
}

/**
 * Configuration Manager Class
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly env: ConfigEnvironment;

  constructor(configStore: ConfigStore, env: ConfigEnvironment = process.env) {
    this.configStore = configStore;
    this.env = env;
  }

  /**
   * Load, validate and resolve the configuration
   *
   * @throws ConfigNotFoundError when the store has nothing
   * @throws ConfigValidationError when the content does not match the schema
   */
  async load(): Promise<LeashConfig> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) {
      throw new ConfigNotFoundError(this.configStore.describe());
    }
    return resolveConfig(validateConfig(raw), this.env);
  }
}
