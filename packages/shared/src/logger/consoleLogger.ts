import { LOG_LEVELS, type LogLevel, type Logger } from './types';

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

/**
 * Writes every level to stderr; stdout is reserved for command output.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'warn';
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  trace(message: string): void {
    this.write('trace', message);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(error: Error, message?: string): void {
    if (!this.isEnabled('error')) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    console.error(`${level}: ${message}`);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  trace(message: string) {
    return this.base.trace(this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
