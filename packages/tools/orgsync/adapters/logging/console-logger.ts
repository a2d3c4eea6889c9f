/**
 * Adapter: ConsoleLogger
 *
 * Writes `[LEVEL] message` lines to stderr; stdout carries command output.
 * Debug lines are only written when verbose.
 */

import type { Logger, LogLevel } from "../../domain/ports/logger.ts";

export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  error(message: string): void {
    this.write("error", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write("debug", message);
    }
  }

  private write(level: LogLevel, message: string): void {
    console.error(`[${level.toUpperCase()}] ${message}`);
  }
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
