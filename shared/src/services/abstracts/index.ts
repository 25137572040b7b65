/**
 * Abstract Service Classes
 *
 * Export all abstract service classes used as tokens for dependency injection.
 * These classes serve as both TypeScript types AND runtime keys for ServiceProvider.
 *
 * @example
 * ```typescript
 * import { AActivityLog, ACredentialStore, ServiceProvider } from '@minidrive/shared';
 *
 * const credentials = ServiceProvider.get(ACredentialStore);
 * const activityLog = ServiceProvider.get(AActivityLog);
 * ```
 */

// Base service class
export { AService } from './AService.js';

// Logging services (from utils/logging/)
export { ALogger, type LogContext } from '../../utils/logging/ALogger.js';
export {
  ALogCapture,
  type CapturedLog,
  type LogFilter,
  type LogCaptureStatus,
} from '../../utils/logging/ALogCapture.js';

// Collaborators
export { AActivityLog, type ActivityListener } from '../../activity/AActivityLog.js';
export { ACredentialStore } from '../../auth/ACredentialStore.js';
export { APlatformOpener } from '../../preview/APlatformOpener.js';
