/**
 * Custom Error Classes for the agent registry
 */

/**
 * Base error class for all registry-related errors
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}

/**
 * Error thrown when selection is attempted with an empty agent pool
 */
export class NoAgentsConfiguredError extends RegistryError {
  constructor() {
    super('No agents configured');
    this.name = 'NoAgentsConfiguredError';
    Object.setPrototypeOf(this, NoAgentsConfiguredError.prototype);
  }
}

/**
 * Error thrown when an operation names an agent outside the configured pool
 */
export class UnknownAgentError extends RegistryError {
  public readonly agentName: string;

  constructor(agentName: string) {
    super(`Unknown agent: ${agentName}`);
    this.name = 'UnknownAgentError';
    this.agentName = agentName;
    Object.setPrototypeOf(this, UnknownAgentError.prototype);
  }
}
