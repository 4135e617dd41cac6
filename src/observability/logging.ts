/**
 * Logging for the Ollama client
 *
 * Structured logging with configurable levels. Services and the transport
 * log through children tagged `{ service }` or `{ component }`. Every entry
 * has the bearer token and similar keys redacted before it is written or
 * stored. `InMemoryLogger` children share their parent's entries, so one
 * logger handed to the client captures what every service logs.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const SENSITIVE_KEYS = ['authToken', 'token', 'password', 'apiKey', 'secret', 'authorization'];

/**
 * Replace values of well-known secret keys with a placeholder.
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
 * Console-based logger writing one JSON object per line
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly baseContext: Record<string, unknown>;

  constructor(level: LogLevel = 'info', context: Record<string, unknown> = {}) {
    this.level = level;
    this.baseContext = context;
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, { ...this.baseContext, ...context });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] > LOG_LEVELS[this.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context: redact({ ...this.baseContext, ...context }),
    };

    const output = JSON.stringify(entry);

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
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  trace(_message: string, _context?: Record<string, unknown>): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * In-memory logger for testing
 *
 * Children append to the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly baseContext: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.baseContext = context;
    this.entries = entries;
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
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

  clear(): void {
    this.entries.length = 0;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      timestamp: Date.now(),
      context: redact({ ...this.baseContext, ...context }),
    });
  }
}

/**
 * Create a console logger at the given level
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return new ConsoleLogger(level);
}
