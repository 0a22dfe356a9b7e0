import * as fs from 'fs/promises';
import type { DigestEvent } from '../types/events';
import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import type { Logger, LoggerOptions } from './types';

/**
 * Appends run events to a JSON Lines file and prints messages to the console.
 */
export class JsonlLogger implements Logger {
  private readonly console: ConsoleLogger;

  constructor(
    private readonly filePath: string,
    options: LoggerOptions = {},
  ) {
    this.console = new ConsoleLogger(options);
  }

  async log(event: DigestEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: do not fail the run due to logging.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: DigestEvent, message: string): Promise<void> {
    this.console.info(message);
    await this.log(event);
  }

  debug(message: string): void {
    this.console.debug(message);
  }

  info(message: string): void {
    this.console.info(message);
  }

  warn(message: string): void {
    this.console.warn(message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}
