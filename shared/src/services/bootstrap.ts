/**
 * Service Bootstrap
 *
 * Initializes all global services at application startup.
 * Services are registered and then initialized in order of their `order` property.
 *
 * @example
 * ```typescript
 * // In cli/src/index.ts
 * import { bootstrapServices } from '@minidrive/shared';
 *
 * async function main() {
 *   await bootstrapServices();
 *   program.parse();
 * }
 * ```
 */
import { ServiceProvider } from './registry.js';
import {
  ALogger,
  ALogCapture,
  AActivityLog,
  ACredentialStore,
  APlatformOpener,
} from './abstracts/index.js';

import { logger } from '../utils/logging/logger.js';
import { logCapture } from '../utils/logging/logCapture.js';
import { MemoryActivityLog } from '../activity/activityLog.js';
import { FileCredentialStore } from '../auth/credentialStore.js';
import { SystemOpener } from '../preview/systemOpener.js';

/**
 * Replacement collaborators, mainly for tests and embedding callers.
 */
export interface ServiceOverrides {
  activityLog?: AActivityLog;
  credentialStore?: ACredentialStore;
  opener?: APlatformOpener;
}

/**
 * Bootstrap all global services.
 *
 * Registers all services and initializes them in order:
 * 1. Logger (order: -100) - Ready first for other services to log
 * 2. LogCapture (order: -90) - Ready for capturing logs
 * 3. ActivityLog, CredentialStore, PlatformOpener (order: 0)
 */
export async function bootstrapServices(overrides: ServiceOverrides = {}): Promise<void> {
  if (ServiceProvider.isInitialized()) return;

  ServiceProvider.register(ALogger, logger);
  ServiceProvider.register(ALogCapture, logCapture);
  ServiceProvider.register(AActivityLog, overrides.activityLog ?? new MemoryActivityLog());
  ServiceProvider.register(ACredentialStore, overrides.credentialStore ?? new FileCredentialStore());
  ServiceProvider.register(APlatformOpener, overrides.opener ?? new SystemOpener());

  await ServiceProvider.initialize();

  logger.debug('Services bootstrapped', { component: 'Bootstrap' });
}
