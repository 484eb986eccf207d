import type { Logger, LogLevel } from '../types';

export interface ConsoleLoggerConfig {
  /**
   * Minimum level that gets written
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Enable colored output
   * @default true
   */
  colors?: boolean;

  /**
   * Show timestamps
   * @default true
   */
  timestamps?: boolean;

  /**
   * Prefix for log messages
   * @default '[ShopChain]'
   */
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger that pretty-prints to the console.
 * Errors and warnings go to stderr, everything else to stdout.
 */
export class ConsoleLogger implements Logger {
  private config: Required<ConsoleLoggerConfig>;

  constructor(config: ConsoleLoggerConfig = {}) {
    this.config = {
      level: config.level || 'info',
      colors: config.colors !== false,
      timestamps: config.timestamps !== false,
      prefix: config.prefix || '[ShopChain]',
    };
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    console.log(this.format('debug', message, meta));
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    console.log(this.format('info', message, meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    console.warn(this.format('warn', message, meta));
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    console.error(this.format('error', message, meta));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }

  private format(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(this.dim(`[${this.formatTime(new Date())}]`));
    }

    parts.push(this.config.prefix);
    parts.push(this.colorFor(level, level.toUpperCase()));
    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.dim(JSON.stringify(meta)));
    }

    return parts.join(' ');
  }

  // ============================================================================
  // Formatting Helpers
  // ============================================================================

  private formatTime(date: Date): string {
    return date.toISOString().slice(11, 23);
  }

  private colorFor(level: LogLevel, text: string): string {
    switch (level) {
      case 'debug':
        return this.dim(text);
      case 'info':
        return this.cyan(text);
      case 'warn':
        return this.yellow(text);
      case 'error':
        return this.red(text);
    }
  }

  private dim(text: string): string {
    return this.config.colors ? `\x1b[2m${text}\x1b[0m` : text;
  }

  private cyan(text: string): string {
    return this.config.colors ? `\x1b[36m${text}\x1b[0m` : text;
  }

  private yellow(text: string): string {
    return this.config.colors ? `\x1b[33m${text}\x1b[0m` : text;
  }

  private red(text: string): string {
    return this.config.colors ? `\x1b[31m${text}\x1b[0m` : text;
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
