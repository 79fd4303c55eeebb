/**
 * Configuration types for the Leash coordination engine.
 *
 * `LeashConfigInput` is the shape accepted on disk (validated against
 * `schemas/leash_config.schema.yaml`); `LeashConfig` is the resolved view
 * with every default applied.
 */

export type AgentConfig = {
  /** Identity; also the git author name and branch prefix */
  name: string;
  displayName: string;
  email: string;
  /** Name of the environment variable holding this agent's credential */
  credentialRef?: string;
};

export type StoreConfig = {
  url?: string;
  keyPrefix: string;
  retentionSeconds: number;
};

export type GitHubTargetConfig = {
  owner: string;
  repo: string;
  baseBranch: string;
  tokenEnv: string;
};

export type ChatConfig = {
  /** Bot user id stripped from mentions, e.g. "U0BOT" */
  botUserId?: string;
  /** Base URL used to build requester profile links */
  workspaceUrl?: string;
};

export type FeedbackConfig = {
  awaitTimeoutSeconds: number;
  pollIntervalSeconds: number;
};

export type RetryConfig = {
  delaysSeconds: number[];
};

export type LeashConfig = {
  agents: AgentConfig[];
  store: StoreConfig;
  github: GitHubTargetConfig;
  chat: ChatConfig;
  feedback: FeedbackConfig;
  retry: RetryConfig;
};

export type LeashConfigInput = {
  agents: AgentConfig[];
  store?: Partial<StoreConfig>;
  github: Pick<GitHubTargetConfig, 'owner' | 'repo'> & Partial<GitHubTargetConfig>;
  chat?: ChatConfig;
  feedback?: Partial<FeedbackConfig>;
  retry?: Partial<RetryConfig>;
};

/**
 * Environment variables that override file values.
 */
export type ConfigEnvironment = {
  LEASH_REDIS_URL?: string;
  LEASH_KEY_PREFIX?: string;
  /** "owner/repo" */
  LEASH_GITHUB_REPO?: string;
  LEASH_BASE_BRANCH?: string;
};

export interface IConfigManager {
  load(): Promise<LeashConfig>;
}
