/**
 * Structured logging for the agent and its resilience layer
 *
 * Components log snake_case event names with a flat context object, e.g.
 * `logger.info('retry_attempt', { attempt: 1, delayMs: 1000 })`.
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context: Record<string, unknown>;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const SENSITIVE_KEYS = ['authToken', 'token', 'password', 'apiKey', 'secret'];

function createDefaultLoggingConfig(): LoggingConfig {
  return {
    level: 'info',
    format: 'json',
  };
}

/**
 * Replace values of sensitive keys with a placeholder
 */
export function redact(context: Record<string, unknown>): Record<string, unknown> {
  const result = { ...context };
  for (const key of SENSITIVE_KEYS) {
    if (key in result) {
      result[key] = '[REDACTED]';
    }
  }
  return result;
}

/**
 * Console-based logger
 */
export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;
  private readonly baseContext: Record<string, unknown>;

  constructor(config?: Partial<LoggingConfig>, context: Record<string, unknown> = {}) {
    this.config = { ...createDefaultLoggingConfig(), ...config };
    this.baseContext = context;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const merged = redact({ ...this.baseContext, ...context });
    const output =
      this.config.format === 'json'
        ? JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...merged })
        : this.formatPretty(level, message, merged);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'debug':
      case 'trace':
        console.debug(output);
        break;
    }
  }

  private formatPretty(level: LogLevel, message: string, context: Record<string, unknown>): string {
    const fields = Object.entries(context)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
    return fields ? `${line} ${fields}` : line;
  }
}

/**
 * No-op logger, the default for components constructed without one
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * In-memory logger for testing. Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly baseContext: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.baseContext = context;
    this.entries = entries;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.entries);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  getMessages(): string[] {
    return this.entries.map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      timestamp: Date.now(),
      context: { ...this.baseContext, ...context },
    });
  }
}

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  return new ConsoleLogger(config);
}
