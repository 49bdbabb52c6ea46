/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _error?: Error, _context?: Record<string, unknown>): void {}
}

export interface ConsoleLoggerOptions {
  /**
   * Lowest level written; defaults to info
   */
  level?: LogLevel;
  /**
   * Tag in front of every line; defaults to "amqp-bridge"
   */
  prefix?: string;
}

/**
 * Console logger writing one line per entry, context as JSON:
 *
 * ```
 * [amqp-bridge] WARN worker-2 channel closed by broker {"label":"worker-2"}
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly prefix: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.level ?? 'info';
    this.prefix = options.prefix ?? 'amqp-bridge';
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.enabled('error')) {
      return;
    }
    const detail = error ? `${message}: ${error.message}` : message;
    console.error(this.format('error', detail, context));
    if (error?.stack) {
      console.error(error.stack);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${this.prefix}] ${level.toUpperCase()} ${message}${suffix}`;
  }
}

/**
 * Wrap a logger so every entry carries `scope` in its context. Entry context
 * wins on key clashes.
 */
export function scopedLogger(logger: Logger, scope: Record<string, unknown>): Logger {
  const merge = (context?: Record<string, unknown>): Record<string, unknown> => ({
    ...scope,
    ...context,
  });

  return {
    debug: (message, context) => logger.debug(message, merge(context)),
    info: (message, context) => logger.info(message, merge(context)),
    warn: (message, context) => logger.warn(message, merge(context)),
    error: (message, error, context) => logger.error(message, error, merge(context)),
  };
}
