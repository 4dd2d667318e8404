/**
 * Logger used across the builder and the CLI
 */

/**
 * Log levels
 */
export enum LogLevel {
  SILLY = 0,
  VERBOSE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  NONE = 6, // Silent mode - no output
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  useStderr?: boolean;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  silly: LogLevel.SILLY,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
  silent: LogLevel.NONE,
};

/**
 * Parse a level name such as "debug" or "WARN"
 * Returns undefined for unknown names
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Logger with a shared default instance and per-component children
 */
export class Logger {
  private static instance: Logger | null = null;

  private readonly level: LogLevel;
  private readonly context: string | undefined;
  private useStderr: boolean;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? undefined;
    this.useStderr = options.useStderr ?? false;
  }

  /**
   * Get the shared instance
   */
  public static getInstance(options?: LoggerOptions): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(options);
    } else if (options?.useStderr !== undefined) {
      Logger.instance.useStderr = options.useStderr;
    }
    return Logger.instance;
  }

  /**
   * Reset the shared instance (primarily for testing)
   */
  public static resetInstance(): void {
    Logger.instance = null;
  }

  /**
   * Create a fresh instance without affecting the shared one
   */
  public static createFresh(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  private formatMessage(message: string): string {
    const timestamp = new Date().toISOString();
    return this.context
      ? `[${timestamp}] [${this.context}] ${message}`
      : `[${timestamp}] ${message}`;
  }

  public silly(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.SILLY) {
      this.writeDebug(this.formatMessage(message), args);
    }
  }

  public verbose(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.VERBOSE) {
      this.writeDebug(this.formatMessage(message), args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      this.writeDebug(this.formatMessage(message), args);
    }
  }

  // console.debug writes to stdout, which a CLI keeps for its result
  private writeDebug(formatted: string, args: unknown[]): void {
    if (this.useStderr) {
      console.error(formatted, ...args);
    } else {
      console.debug(formatted, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      if (this.useStderr) {
        console.error(this.formatMessage(message), ...args);
      } else {
        console.info(this.formatMessage(message), ...args);
      }
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Create a child logger with a specific context
   * The child inherits level and output stream
   */
  public child(context: string): Logger {
    return Logger.createFresh({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      useStderr: this.useStderr,
    });
  }
}

export default Logger.getInstance();
