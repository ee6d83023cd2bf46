import type { Logger, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Writes every level to stderr so that stdout carries findings only.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'warn') {}

  debug(message: string): void {
    if (this.enabled('debug')) console.error(`debug: ${message}`);
  }

  info(message: string): void {
    if (this.enabled('info')) console.error(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.error(`warning: ${message}`);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string): void {
    this.base.debug(this.withPrefix(message));
  }

  info(message: string): void {
    this.base.info(this.withPrefix(message));
  }

  warn(message: string): void {
    this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    this.base.error(error, message ? this.withPrefix(message) : undefined);
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
