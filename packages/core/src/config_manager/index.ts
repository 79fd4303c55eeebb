export {
  ConfigManager,
  validateConfig,
  resolveConfig,
  DEFAULT_KEY_PREFIX,
  DEFAULT_BASE_BRANCH,
  DEFAULT_TOKEN_ENV,
  DEFAULT_AWAIT_TIMEOUT_SECONDS,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_RETRY_DELAYS_SECONDS,
} from './config_manager';
export { ConfigError, ConfigNotFoundError, ConfigValidationError } from './errors';
export type {
  AgentConfig,
  StoreConfig,
  GitHubTargetConfig,
  ChatConfig,
  FeedbackConfig,
  RetryConfig,
  LeashConfig,
  LeashConfigInput,
  ConfigEnvironment,
  IConfigManager,
} from './config_manager.types';
