/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LogLevel } from "../types/config";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  constructor(private level: LogLevel | "silent" = "info") {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: Error): void {
    if (!this.enabled("error")) return;
    console.error(`[ERROR] ${message}`);
    if (error) {
      console.error(error);
    }
  }
}
