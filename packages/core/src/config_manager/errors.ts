/**
 * Configuration errors. Both are fatal at startup.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(source: string) {
    super(`No configuration found at ${source}`);
    this.name = 'ConfigNotFoundError';
    Object.setPrototypeOf(this, ConfigNotFoundError.prototype);
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(public readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
