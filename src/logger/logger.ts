/**
 * Console logger for taggr
 *
 * Features:
 * - Log levels: trace, debug, info, warn, error
 * - Verbosity raised by repeated -d flags
 * - Silent mode that keeps only errors
 */

import pc from "picocolors";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** 0: info and up, 1: adds debug, 2: adds trace */
  verbosity?: number;
  silent?: boolean;
}

export class Logger {
  private verbosity = 0;
  private silent = false;

  configure(options: LoggerOptions): void {
    this.verbosity = options.verbosity ?? 0;
    this.silent = options.silent ?? false;
  }

  trace(message: string): void {
    if (this.verbosity < 2 || this.silent) return;
    this.log("trace", message);
  }

  debug(message: string): void {
    if (this.verbosity < 1 || this.silent) return;
    this.log("debug", message);
  }

  info(message: string): void {
    if (this.silent) return;
    this.log("info", message);
  }

  warn(message: string): void {
    if (this.silent) return;
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  success(message: string): void {
    if (this.silent) return;
    console.log(pc.green("✓"), message);
  }

  fail(message: string): void {
    console.error(pc.red("✗"), message);
  }

  private log(level: LogLevel, message: string): void {
    const formatted = `${this.getPrefix(level)} ${message}`;

    if (level === "error") {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case "trace":
        return pc.dim("[TRACE]");
      case "debug":
        return pc.dim("[DEBUG]");
      case "info":
        return pc.blue("[INFO]");
      case "warn":
        return pc.yellow("[WARN]");
      case "error":
        return pc.red("[ERROR]");
    }
  }
}

// Singleton logger instance
export const logger = new Logger();
