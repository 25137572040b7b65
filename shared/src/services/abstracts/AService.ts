/**
 * Base abstract class for all services.
 *
 * All services extend AService which provides lifecycle methods and initialization order.
 * Services are initialized by ServiceProvider in order of their `order` property.
 *
 * @example
 * ```typescript
 * export abstract class AActivityLog extends AService {
 *   abstract append(line: string): void;
 * }
 *
 * class MemoryActivityLog extends AActivityLog {
 *   append(line: string): void {
 *     this.lines.push(line);
 *   }
 * }
 * ```
 */
export abstract class AService {
  /**
   * Initialization order. Lower numbers initialize first.
   * - -100: ALogger
   * - -90: ALogCapture
   * - 0: collaborators (activity log, credential store, opener)
   */
  readonly order: number = 0;

  /**
   * Called by ServiceProvider.initialize() after all services are registered.
   * Override this to perform async initialization (open files, warm caches, etc.)
   */
  async initialize(): Promise<void> {
    // Default: no-op, override in subclasses that need async init
  }

  /**
   * Called by ServiceProvider.reset() for cleanup.
   */
  async dispose(): Promise<void> {
    // Default: no-op, override in subclasses that need cleanup
  }
}
