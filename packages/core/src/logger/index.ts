export type { Logger, LogLevel } from './logger';
export { createLogger, isLogLevel, logger } from './logger';
