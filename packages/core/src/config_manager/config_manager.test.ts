import { ConfigManager, ConfigNotFoundError, ConfigValidationError, resolveConfig } from './index';
import type { LeashConfigInput } from './index';
import { MemoryConfigStore } from '../config_store/memory/memory_config_store';
import { SchemaValidationCache } from '../schemas';

function minimalConfig(): LeashConfigInput {
  return {
    agents: [
      { name: 'rex', displayName: 'Rex', email: 'rex@example.com' },
      { name: 'fido', displayName: 'Fido', email: 'fido@example.com', credentialRef: 'FIDO_TOKEN' },
    ],
    github: { owner: 'acme', repo: 'web' },
  };
}

describe('ConfigManager', () => {
  let store: MemoryConfigStore;

  beforeEach(() => {
    SchemaValidationCache.clearCache();
    store = new MemoryConfigStore();
  });

  describe('load', () => {
    it('should apply defaults to a minimal configuration', async () => {
      store.setConfig(minimalConfig());

      const config = await new ConfigManager(store, {}).load();

      expect(config).toEqual({
        agents: minimalConfig().agents,
        store: { keyPrefix: 'leash:', retentionSeconds: 86400 },
        github: { owner: 'acme', repo: 'web', baseBranch: 'main', tokenEnv: 'GITHUB_TOKEN' },
        chat: {},
        feedback: { awaitTimeoutSeconds: 600, pollIntervalSeconds: 10 },
        retry: { delaysSeconds: [60, 120, 240] },
      });
    });

    it('should keep explicit values from the file', async () => {
      store.setConfig({
        ...minimalConfig(),
        store: { url: 'redis://localhost:6379', keyPrefix: 'staging:', retentionSeconds: 3600 },
        retry: { delaysSeconds: [1, 2] },
        chat: { botUserId: 'U0BOT', workspaceUrl: 'https://acme.example.com' },
      });

      const config = await new ConfigManager(store, {}).load();

      expect(config.store).toEqual({ url: 'redis://localhost:6379', keyPrefix: 'staging:', retentionSeconds: 3600 });
      expect(config.retry.delaysSeconds).toEqual([1, 2]);
      expect(config.chat).toEqual({ botUserId: 'U0BOT', workspaceUrl: 'https://acme.example.com' });
    });

    it('should apply environment overrides after defaults', async () => {
      store.setConfig(minimalConfig());

      const config = await new ConfigManager(store, {
        LEASH_REDIS_URL: 'redis://cache:6379',
        LEASH_KEY_PREFIX: 'ci:',
        LEASH_GITHUB_REPO: 'other/site',
        LEASH_BASE_BRANCH: 'develop',
      }).load();

      expect(config.store.url).toBe('redis://cache:6379');
      expect(config.store.keyPrefix).toBe('ci:');
      expect(config.github).toEqual({ owner: 'other', repo: 'site', baseBranch: 'develop', tokenEnv: 'GITHUB_TOKEN' });
    });

    it('should throw ConfigNotFoundError when the store is empty', async () => {
      await expect(new ConfigManager(store, {}).load()).rejects.toThrow(
        new ConfigNotFoundError('memory'),
      );
    });

    it('should reject configurations missing required sections', async () => {
      store.setConfig({ agents: minimalConfig().agents });

      const error = await new ConfigManager(store, {}).load().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty('errors', ["/ must have required property 'github'"]);
    });

    it('should reject an empty agent pool', async () => {
      store.setConfig({ ...minimalConfig(), agents: [] });

      await expect(new ConfigManager(store, {}).load()).rejects.toBeInstanceOf(ConfigValidationError);
    });

    it('should reject duplicate agent names', async () => {
      const input = minimalConfig();
      store.setConfig({
        ...input,
        agents: [...input.agents, { name: 'rex', displayName: 'Rex Two', email: 'rex2@example.com' }],
      });

      const error = await new ConfigManager(store, {}).load().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toHaveProperty('errors', ["/agents duplicate agent name 'rex'"]);
    });
  });

  describe('resolveConfig', () => {
    it('should reject a malformed LEASH_GITHUB_REPO', () => {
      expect(() => resolveConfig(minimalConfig(), { LEASH_GITHUB_REPO: 'just-a-repo' })).toThrow(
        "Invalid configuration: LEASH_GITHUB_REPO must look like 'owner/repo', got 'just-a-repo'",
      );
    });

    it('should not share the default retry array between configurations', () => {
      const first = resolveConfig(minimalConfig());
      first.retry.delaysSeconds.push(999);

      expect(resolveConfig(minimalConfig()).retry.delaysSeconds).toEqual([60, 120, 240]);
    });
  });
});
