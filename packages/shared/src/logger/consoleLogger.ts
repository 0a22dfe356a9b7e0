import type { DigestEvent } from '../types/events';
import { formatBindings, type Logger, type LoggerOptions } from './types';

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(event: DigestEvent): void {
    if (this.verbose) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: DigestEvent, message: string): void {
    console.info(message);
    this.log(event);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: DigestEvent) {
    return this.base.log(event);
  }

  trace(event: DigestEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
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

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = formatBindings(this.bindings);
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
