/**
 * Services module - service registry and collaborator tokens
 *
 * Provides a type-safe service locator using abstract classes as tokens.
 *
 * @example
 * ```typescript
 * import { ServiceProvider, AActivityLog, bootstrapServices } from '@minidrive/shared';
 *
 * // At startup
 * await bootstrapServices();
 *
 * // Get services (type-safe!)
 * const activityLog = ServiceProvider.get(AActivityLog);
 * ```
 *
 * @module services
 */

export { bootstrapServices, type ServiceOverrides } from './bootstrap.js';

export { ServiceProvider, type AbstractClass } from './registry.js';

export {
  AService,
  ALogger,
  ALogCapture,
  AActivityLog,
  ACredentialStore,
  APlatformOpener,
} from './abstracts/index.js';
