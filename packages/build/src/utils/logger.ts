/**
 * Logging utilities for the build toolchain
 */

import chalk from 'chalk';

export enum LogLevel {
  Silent = 'silent',
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

/** Log level hierarchy for filtering */
const LOG_LEVELS: Record<LogLevel, number> = {
  [LogLevel.Silent]: -1,
  [LogLevel.Error]: 0,
  [LogLevel.Warn]: 1,
  [LogLevel.Info]: 2,
  [LogLevel.Debug]: 3,
  [LogLevel.Trace]: 4
};

type LogColor = 'red' | 'yellow' | 'white' | 'blue' | 'gray' | 'green' | 'cyan' | 'magenta';

export interface LoggerConfig {
  /** Current log level */
  level: LogLevel;
  /** Whether to use colors in output */
  colors: boolean;
  /** Whether to include timestamps */
  timestamps: boolean;
  /** Output stream for logs */
  output: NodeJS.WritableStream;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.Info,
  colors: Boolean(process.stderr.isTTY) && process.env.NODE_ENV !== 'test',
  timestamps: false,
  output: process.stderr
};

/**
 * Leveled, optionally colored logger. Child loggers add a scope prefix and
 * share the configuration of the logger they were created from.
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly prefix?: string;
  private readonly parent?: Logger;

  constructor(config: Partial<LoggerConfig> = {}, scope: { prefix?: string; parent?: Logger } = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.prefix = scope.prefix;
    this.parent = scope.parent;
  }

  /** Effective configuration, owned by the root logger */
  get settings(): LoggerConfig {
    return this.parent ? this.parent.settings : this.config;
  }

  get level(): LogLevel {
    return this.settings.level;
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  setColors(enabled: boolean): void {
    this.settings.colors = enabled;
  }

  configure(config: Partial<LoggerConfig>): void {
    Object.assign(this.settings, config);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== LogLevel.Silent && LOG_LEVELS[level] <= LOG_LEVELS[this.settings.level];
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Error, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Warn, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Info, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Debug, message, ...args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Trace, message, ...args);
  }

  /**
   * Log a success message (info level, green)
   */
  success(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Info, 'green', '✅', message, args);
  }

  /**
   * Log a failure message (error level, red)
   */
  failure(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Error, 'red', '❌', message, args);
  }

  /**
   * Log a step message (info level, cyan)
   */
  step(message: string, ...args: unknown[]): void {
    this.write(LogLevel.Info, 'cyan', '➡️', message, args);
  }

  timing(label: string, startTime: number): void {
    const duration = Date.now() - startTime;
    this.write(LogLevel.Debug, 'magenta', '⏱️', `${label}: ${duration}ms`, []);
  }

  /**
   * Create a child logger with an additional prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({}, { prefix: childPrefix, parent: this });
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    this.write(level, this.getLevelColor(level), this.getLevelSymbol(level), message, args);
  }

  private write(level: LogLevel, color: LogColor, symbol: string, message: string, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const settings = this.settings;
    const timestamp = settings.timestamps ? `[${new Date().toISOString()}] ` : '';
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const levelStr = level.toUpperCase().padEnd(5);

    let formattedMessage = `${timestamp}${prefix}${symbol} ${levelStr} ${message}`;

    if (args.length > 0) {
      const formattedArgs = args.map(arg =>
        typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg)
      );
      formattedMessage += ' ' + formattedArgs.join(' ');
    }

    if (settings.colors) {
      formattedMessage = chalk[color](formattedMessage);
    }

    settings.output.write(formattedMessage + '\n');
  }

  private getLevelColor(level: LogLevel): LogColor {
    switch (level) {
      case LogLevel.Error:
        return 'red';
      case LogLevel.Warn:
        return 'yellow';
      case LogLevel.Debug:
        return 'blue';
      case LogLevel.Trace:
        return 'gray';
      default:
        return 'white';
    }
  }

  private getLevelSymbol(level: LogLevel): string {
    switch (level) {
      case LogLevel.Error:
        return '🚨';
      case LogLevel.Warn:
        return '⚠️';
      case LogLevel.Debug:
        return '🔍';
      case LogLevel.Trace:
        return '🔬';
      default:
        return 'ℹ️';
    }
  }
}

/** Global logger instance */
export const logger = new Logger();

/**
 * Configure the global logger and every scoped logger derived from it
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  logger.configure(config);
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(scope: string): Logger {
  return logger.child(scope);
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}
