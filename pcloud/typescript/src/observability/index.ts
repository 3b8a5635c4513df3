/**
 * Logging for the pCloud client.
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const SENSITIVE_FIELDS = new Set(['auth', 'token', 'password', 'authorization', 'secret', 'linkpassword']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields from a log context
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;
  private readonly context: Record<string, unknown>;

  constructor(options: { level?: LogLevel; prefix?: string; context?: Record<string, unknown> } = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '[pCloud]';
    this.context = options.context ?? {};
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const merged = redactSensitive({ ...this.context, ...context });
    let log = `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
    if (Object.keys(merged).length > 0) {
      log += ` ${JSON.stringify(merged)}`;
    }
    return log;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, context));
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      prefix: this.prefix,
      context: { ...this.context, ...context },
    });
  }
}

/**
 * No-op logger
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

/**
 * In-memory logger for testing
 */
export class InMemoryLogger implements Logger {
  private logs: LogEntry[] = [];

  constructor(private readonly context: Record<string, unknown> = {}) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.add('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.add('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.add('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.add('error', message, context);
  }

  child(context: Record<string, unknown>): Logger {
    const child = new InMemoryLogger({ ...this.context, ...context });
    // Share the logs array
    child.logs = this.logs;
    return child;
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  clear(): void {
    this.logs.length = 0;
  }

  private add(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level, message, context: redactSensitive({ ...this.context, ...context }) });
  }
}
