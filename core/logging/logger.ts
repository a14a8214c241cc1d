export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Sink for formatted lines. Defaults to the console method matching the level. */
  write?: (level: LogLevel, line: string) => void;
}

/**
 * Writes `[LEVEL] [scope] message {json}` lines.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;
  private readonly write: (level: LogLevel, line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
    this.write = options.write ?? writeToConsole;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      write: this.write
    });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const prefix = `[${level.toUpperCase()}]${this.scope ? ` [${this.scope}]` : ''}`;
    const suffix = data && Object.keys(data).length > 0 ? ` ${safeStringify(data)}` : '';
    this.write(level, `${prefix} ${message}${suffix}`);
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

function safeStringify(data: Record<string, unknown>): string {
  try {
    return JSON.stringify(data, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  } catch {
    return '[unserializable]';
  }
}

class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export const silentLogger: Logger = new SilentLogger();
