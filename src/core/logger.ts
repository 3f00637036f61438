/**
 * Minimal structured logger used across the link layer.
 *
 * Components never reach for a global logger; one is passed in through their
 * options and defaults to {@link silentLogger}, so parallel test instances
 * stay quiet and isolated.
 *
 * @module core/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Structured context attached to a log line.
 */
export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;

  /**
   * Returns a logger whose lines are prefixed with the given scope.
   */
  child(scope: string): Logger;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Output sink for the console logger. Defaults to the global console.
 */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly scope?: string | undefined;
  readonly sink?: LogSink | undefined;
  readonly timestamps?: boolean | undefined;
}

function formatContext(context: LogContext | undefined): string {
  if (!context) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    if (value instanceof Error) {
      parts.push(`${key}=${value.name}: ${value.message}`);
    } else if (typeof value === 'string') {
      parts.push(`${key}=${value}`);
    } else {
      parts.push(`${key}=${JSON.stringify(value)}`);
    }
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly level: LogLevel,
    private readonly scope: string | undefined,
    private readonly sink: LogSink,
    private readonly timestamps: boolean,
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new ConsoleLogger(this.level, nested, this.sink, this.timestamps);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const prefix = this.timestamps ? `${new Date().toISOString()} ` : '';
    const scope = this.scope ? `[${this.scope}] ` : '';
    this.sink[level](`${prefix}${level.toUpperCase()} ${scope}${message}${formatContext(context)}`);
  }
}

/**
 * Creates a logger writing formatted lines to the console (or a custom sink).
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', scope: 'padlink' });
 * logger.child('tunnel').info('listening', { port: 9360 });
 * // 2026-01-01T00:00:00.000Z INFO [padlink:tunnel] listening port=9360
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return new ConsoleLogger(
    options.level ?? 'info',
    options.scope,
    options.sink ?? console,
    options.timestamps ?? true,
  );
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
