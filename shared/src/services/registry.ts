/**
 * Service Registry
 *
 * A type-safe service locator using abstract classes as tokens.
 * Abstract classes exist at runtime, serving as both TypeScript types AND lookup keys.
 *
 * ## Usage
 *
 * ```typescript
 * import { ServiceProvider, AActivityLog, MemoryActivityLog } from '@minidrive/shared';
 *
 * // At startup - register and initialize
 * ServiceProvider.register(AActivityLog, new MemoryActivityLog());
 * await ServiceProvider.initialize();
 *
 * // Get services (sync, type-safe!)
 * const activityLog = ServiceProvider.get(AActivityLog);
 * ```
 *
 * ## Testing
 *
 * ```typescript
 * afterEach(async () => {
 *   await ServiceProvider.reset();
 * });
 * ```
 *
 * @module services
 */

import type { AService } from './abstracts/AService.js';

/**
 * Abstract class constructor type for service tokens.
 */
export type AbstractClass<T> = abstract new (...args: never[]) => T;

/**
 * Service Provider - static access to services with abstract class tokens.
 */
export class ServiceProvider {
  private static globalInstances = new Map<AbstractClass<AService>, AService>();
  private static globalInitialized = false;
  private static globalInitPromise: Promise<void> | null = null;

  /**
   * Register a global service.
   *
   * @throws Error if called after initialization
   */
  static register<T extends AService>(token: AbstractClass<T>, instance: T): void {
    if (this.globalInitialized) {
      throw new Error('Cannot register after global initialization');
    }
    this.globalInstances.set(token, instance);
  }

  /**
   * Initialize registered services in order (by service.order, lowest first).
   * Concurrent callers share one initialization run.
   */
  static async initialize(): Promise<void> {
    if (this.globalInitialized) return;

    if (!this.globalInitPromise) {
      this.globalInitPromise = (async () => {
        const sorted = [...this.globalInstances.values()].sort((a, b) => a.order - b.order);
        for (const instance of sorted) {
          await instance.initialize();
        }
        this.globalInitialized = true;
      })();
    }

    await this.globalInitPromise;
  }

  /**
   * Get a global service by its abstract class token.
   *
   * @throws Error if not initialized or service not registered
   */
  static get<T extends AService>(token: AbstractClass<T>): T {
    if (!this.globalInitialized) {
      throw new Error('ServiceProvider not initialized. Call initialize() first.');
    }
    const instance = this.globalInstances.get(token);
    if (!instance) {
      throw new Error(`Service not registered: ${token.name}`);
    }
    return instance as T;
  }

  /**
   * Check if a global service is registered.
   */
  static has<T extends AService>(token: AbstractClass<T>): boolean {
    return this.globalInstances.has(token);
  }

  /**
   * Check if global services are initialized.
   */
  static isInitialized(): boolean {
    return this.globalInitialized;
  }

  /**
   * Reset all services - dispose in reverse order and clear registrations.
   *
   * Useful for testing and cleanup.
   */
  static async reset(): Promise<void> {
    const sorted = [...this.globalInstances.values()].sort((a, b) => b.order - a.order);

    for (const instance of sorted) {
      await instance.dispose();
    }
    this.globalInstances.clear();
    this.globalInitialized = false;
    this.globalInitPromise = null;
  }
}
