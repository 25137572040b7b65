/**
 * Logging utilities for MiniDrive
 * @module utils/logging
 */

// Abstract classes and types
export { ALogger, type LogContext } from './ALogger.js';
export {
  ALogCapture,
  type CapturedLog,
  type LogFilter,
  type LogCaptureStatus,
  type LogLevel,
} from './ALogCapture.js';

// Implementations
export { Logger, logger } from './logger.js';
export { LogCapture, logCapture } from './logCapture.js';
