import { logCapture } from './logCapture.js';
import { ALogger } from './ALogger.js';
import { isVerbose, isDebugLevel, VERBOSE_TIMING, LOG_LEVEL } from '../../config/env.js';
import type { LogContext } from './ALogger.js';
import type { LogLevel } from './ALogCapture.js';

export type { LogContext } from './ALogger.js';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Fields rendered in a fixed position ahead of free-form context keys
const STANDARD_FIELDS = ['component', 'operation', 'root', 'durationMs'];

export class Logger extends ALogger {
  private operationTimers = new Map<string, number>();

  constructor(private readonly threshold: LogLevel = isDebugLevel() ? 'debug' : LOG_LEVEL) {
    super();
  }

  /**
   * Start timing an operation (for verbose mode timing)
   */
  startOperation(operationId: string): void {
    if (VERBOSE_TIMING) {
      this.operationTimers.set(operationId, Date.now());
    }
  }

  /**
   * End timing an operation and return duration
   */
  endOperation(operationId: string): number | undefined {
    const startTime = this.operationTimers.get(operationId);
    if (startTime === undefined) return undefined;
    this.operationTimers.delete(operationId);
    return Date.now() - startTime;
  }

  /**
   * Whether messages at `level` pass the configured threshold.
   */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.threshold];
  }

  formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    let contextStr = '';
    if (context) {
      const parts: string[] = [];

      if (context.component) parts.push(`component=${context.component}`);
      if (context.operation) parts.push(`op=${context.operation}`);
      if (context.root) parts.push(`root=${context.root}`);
      if (context.durationMs !== undefined) parts.push(`duration=${context.durationMs}ms`);

      for (const key of Object.keys(context)) {
        if (!STANDARD_FIELDS.includes(key) && context[key] !== undefined) {
          parts.push(`${key}=${String(context[key])}`);
        }
      }

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp} ${levelStr}${contextStr} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    logCapture.capture('debug', message, context);
    if (this.isEnabled('debug')) {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    logCapture.capture('info', message, context);
    if (this.isEnabled('info')) {
      console.log(this.formatMessage('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    logCapture.capture('warn', message, context);
    if (this.isEnabled('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    logCapture.capture('error', message, context, error);
    if (!this.isEnabled('error')) return;

    console.error(this.formatMessage('error', message, context));
    if (error instanceof Error) {
      console.error(`  Error: ${error.message}`);
      // In verbose mode or debug level, always show stack traces
      if (error.stack && (isVerbose() || isDebugLevel())) {
        console.error(`  Stack: ${error.stack}`);
      }
      if (isVerbose() && error.cause !== undefined) {
        console.error(`  Cause: ${String(error.cause)}`);
      }
    } else if (error !== undefined) {
      console.error(`  Details: ${JSON.stringify(error, null, 2)}`);
    }
  }

  /**
   * Log with the duration of an operation started by startOperation()
   */
  timed(level: LogLevel, message: string, operationId: string, context?: LogContext): void {
    const durationMs = this.endOperation(operationId);
    const timedContext: LogContext = { ...context, durationMs };

    switch (level) {
      case 'debug':
        this.debug(message, timedContext);
        break;
      case 'info':
        this.info(message, timedContext);
        break;
      case 'warn':
        this.warn(message, timedContext);
        break;
      case 'error':
        this.error(message, undefined, timedContext);
        break;
    }
  }
}

export const logger = new Logger();
