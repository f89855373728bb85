/**
 * Logger used across file-serve
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

const levelNames: Record<string, LogLevel> = {
  silly: LogLevel.SILLY,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

/**
 * Map a level name (e.g. from LOG_LEVEL) to a LogLevel, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  return levelNames[value.trim().toLowerCase()] ?? LogLevel.INFO;
}

export class Logger {
  /** The singleton instance */
  private static instance: Logger | null = null;

  private level: LogLevel;
  private context: string | undefined;
  private useStderr: boolean;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? undefined;
    this.useStderr = options.useStderr ?? false;
  }

  /**
   * Get the singleton instance of Logger
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
   * Reset the singleton instance (primarily for testing)
   */
  public static resetInstance(): void {
    Logger.instance = null;
  }

  /**
   * Create a fresh instance without affecting the singleton
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

  /**
   * Debug-ish levels go to console.debug, which shares stdout with console.log
   */
  private writeDebug(message: string, args: unknown[]): void {
    if (this.useStderr) {
      console.error(this.formatMessage(message), ...args);
    } else {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public silly(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.SILLY) {
      this.writeDebug(message, args);
    }
  }

  public verbose(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.VERBOSE) {
      this.writeDebug(message, args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      this.writeDebug(message, args);
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

  /**
   * Create a child logger with a specific context
   */
  public child(context: string): Logger {
    return Logger.createFresh({
      level: this.level,
      context,
      useStderr: this.useStderr,
    });
  }

  /**
   * Route every level to stderr, leaving stdout to the program's own output
   */
  public setUseStderr(useStderr: boolean): void {
    this.useStderr = useStderr;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }
}
