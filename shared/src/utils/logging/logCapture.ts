import { ALogCapture } from './ALogCapture.js';
import type { CapturedLog, LogFilter, LogCaptureStatus, LogLevel } from './ALogCapture.js';

export type { CapturedLog, LogFilter, LogCaptureStatus, LogLevel } from './ALogCapture.js';

const DEFAULT_MAX_LOGS = 2000;
const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Bounded in-memory log buffer. Oldest entries are evicted first.
 */
export class LogCapture extends ALogCapture {
  private logs: CapturedLog[] = [];
  private maxLogs = DEFAULT_MAX_LOGS;
  private enabled = true;
  private dropped = 0;

  capture(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error | unknown
  ): void {
    if (!this.enabled) return;

    const entry: CapturedLog = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context: { ...context } }),
    };

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { message: error.message, stack: error.stack }
        : { message: String(error) };
    }

    this.logs.push(entry);
    this.trim();
  }

  getLogs(filter: LogFilter = {}): {
    logs: CapturedLog[];
    total: number;
    filtered: number;
  } {
    const since = filter.since ? Date.parse(filter.since) : undefined;
    const minSeverity = filter.minLevel ? SEVERITY[filter.minLevel] : undefined;

    const matching = this.logs.filter((log) => {
      if (filter.level && log.level !== filter.level) return false;
      if (minSeverity !== undefined && SEVERITY[log.level] < minSeverity) return false;
      if (filter.component && log.context?.component !== filter.component) return false;
      if (since !== undefined && Date.parse(log.timestamp) < since) return false;
      return true;
    });

    const limit = Math.min(filter.limit ?? DEFAULT_LIMIT, MAX_LIMIT);
    const logs = limit > 0 ? matching.slice(-limit) : [];

    return { logs, total: this.logs.length, filtered: logs.length };
  }

  clear(): void {
    this.logs = [];
    this.dropped = 0;
  }

  setMaxLogs(max: number): void {
    this.maxLogs = Math.max(0, Math.floor(max));
    this.trim();
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  getStatus(): LogCaptureStatus {
    return {
      enabled: this.enabled,
      count: this.logs.length,
      maxLogs: this.maxLogs,
      dropped: this.dropped,
    };
  }

  private trim(): void {
    const excess = this.logs.length - this.maxLogs;
    if (excess > 0) {
      this.logs.splice(0, excess);
      this.dropped += excess;
    }
  }
}

export const logCapture: ALogCapture = new LogCapture();
