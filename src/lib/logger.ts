import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Leveled logger with colored output
 *
 * Child loggers share their parent's level, so `logger.configure({ level })`
 * in the CLI reaches the loaders that took a child at import time.
 */
export class Logger {
  private levelRef: { level: LogLevel };
  private prefix: string;

  constructor(prefix = "", levelRef: { level: LogLevel } = { level: "info" }) {
    this.prefix = prefix;
    this.levelRef = levelRef;
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.levelRef.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  get level(): LogLevel {
    return this.levelRef.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.levelRef.level];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("debug")) {
      console.debug(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("info")) {
      console.info(this.format(message), ...args);
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("warn")) {
      console.warn(chalk.yellow(this.format(message)), ...args);
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("info")) {
      console.info(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return new Logger(childPrefix, this.levelRef);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
