/**
 * Logger Utility
 * Handles leveled, timestamped output through a replaceable sink
 */

import type { LogLevel } from "../types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  timestamps?: boolean;
  sink?: LogSink;
  now?: () => Date;
}

export class Logger {
  private level: LogLevel;
  private timestamps: boolean;
  private sink: LogSink;
  private now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.timestamps = options.timestamps ?? true;
    this.sink = options.sink ?? ((line) => console.error(line));
    this.now = options.now ?? (() => new Date());
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    this.write("error", message);
    if (error !== undefined && this.isEnabled("error")) {
      this.sink(error instanceof Error ? (error.stack ?? error.message) : String(error));
    }
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    const tag = `[${level.toUpperCase()}]`;
    const line = this.timestamps
      ? `${this.now().toISOString()} ${tag} ${message}`
      : `${tag} ${message}`;
    this.sink(line);
  }
}
