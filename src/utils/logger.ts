/**
 * Console + JSON-lines file logger
 *
 * One root logger per process (getLogger). Modules log through a scoped view,
 * `scopedLogger("store")`, which resolves the current root on every call, so
 * switching debug, quiet or file output on the root applies everywhere.
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
  stack?: string;
}

export interface LoggerOptions {
  debug?: boolean;
  logToFile?: boolean;
  logDir?: string;
  /** Suppress info/debug console output (errors and warnings still print) */
  quiet?: boolean;
}

/** What modules log through */
export interface LogSink {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";
const FLUSH_INTERVAL_MS = 5000;

class Logger implements LogSink {
  private debugMode: boolean;
  private quiet: boolean;
  private logToFile: boolean;
  private readonly logDir: string;
  private queue: LogEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(options: LoggerOptions = {}) {
    this.debugMode = options.debug ?? (process.env.STRATUM_DEBUG === "true");
    this.quiet = options.quiet ?? false;
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? path.join(os.homedir(), ".stratum", "logs");
  }

  /** Create the log directory and start the periodic flush (file logging only) */
  async init(): Promise<void> {
    if (!this.logToFile || this.flushTimer) return;

    await fs.mkdir(this.logDir, { recursive: true });
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, FLUSH_INTERVAL_MS);
    // Don't keep the CLI process alive just for log flushing
    this.flushTimer.unref();
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.write("error", message, error);
  }

  /** A view of this logger that tags every entry with `scope` */
  child(scope: string): LogSink {
    return new ScopedLogger(() => this, scope);
  }

  write(level: LogLevel, message: string, data?: unknown, scope?: string): void {
    if (level === "debug" && !this.debugMode) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (scope) entry.scope = scope;
    if (data instanceof Error) {
      entry.data = { name: data.name, message: data.message };
      entry.stack = data.stack;
    } else if (data !== undefined) {
      entry.data = data;
    }

    const line = this.format(entry);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else if (!this.quiet) {
      console.log(line);
    }

    if (this.logToFile) {
      this.queue.push(entry);
    }
  }

  private format(entry: LogEntry): string {
    const label = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = `${LEVEL_COLORS[entry.level]}${label}${RESET} `;
    if (entry.scope) output += `[${entry.scope}] `;
    output += entry.message;

    if (entry.stack) {
      if (this.debugMode) output += `\n${entry.stack}`;
    } else if (entry.data !== undefined) {
      output += ` ${JSON.stringify(entry.data)}`;
    }
    return output;
  }

  async flush(): Promise<void> {
    if (this.queue.length === 0) {
      return;
    }

    const entries = this.queue;
    this.queue = [];
    const date = new Date().toISOString().split("T")[0];

    try {
      const lines = entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
      await fs.appendFile(path.join(this.logDir, `stratum-${date}.log`), lines, "utf-8");
    } catch (err) {
      // Fallback to console if file write fails
      console.error("Failed to write to log file:", err);
    }
  }

  /** Stop the flush timer and write out anything queued */
  async close(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  /** Turn file output on or off; queued entries are written out on the way off */
  async setLogToFile(enabled: boolean): Promise<void> {
    if (enabled === this.logToFile) return;
    if (enabled) {
      this.logToFile = true;
      await this.init();
      return;
    }
    await this.close();
    this.logToFile = false;
  }
}

class ScopedLogger implements LogSink {
  constructor(
    private readonly resolve: () => Logger,
    readonly scope: string
  ) {}

  debug(message: string, data?: unknown): void {
    this.resolve().write("debug", message, data, this.scope);
  }

  info(message: string, data?: unknown): void {
    this.resolve().write("info", message, data, this.scope);
  }

  warn(message: string, data?: unknown): void {
    this.resolve().write("warn", message, data, this.scope);
  }

  error(message: string, error?: unknown): void {
    this.resolve().write("error", message, error, this.scope);
  }
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  return rootLogger;
}

/** Drop the root logger (tests) */
export function resetLogger(): void {
  rootLogger = null;
}

/** Scoped view of whichever logger is the root at call time */
export function scopedLogger(scope: string): LogSink {
  return new ScopedLogger(getLogger, scope);
}

// Error tracking utilities
export interface ErrorContext {
  component?: string;
  action?: string;
  metadata?: Record<string, unknown>;
}

export function trackError(error: Error, context?: ErrorContext): void {
  getLogger().write(
    "error",
    error.message,
    {
      error: { name: error.name, message: error.message, stack: error.stack },
      action: context?.action,
      metadata: context?.metadata,
    },
    context?.component
  );
}

export function createErrorTracker(component: string) {
  return (error: Error, action?: string, metadata?: Record<string, unknown>) => {
    trackError(error, { component, action, metadata });
  };
}

export { Logger };
