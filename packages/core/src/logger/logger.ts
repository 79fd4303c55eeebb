export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LEVELS.indexOf(this.level);
    const messageLevelIndex = LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function levelFromEnvironment(): LogLevel {
  if (process.env['NODE_ENV'] === "test") {
    return "silent";
  }
  const fromEnv = process.env['LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

// Factory function for component loggers
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level ?? levelFromEnvironment());
}

// Global logger for direct use
export const logger = createLogger("[Leash] ");
