import { AActivityLog, type ActivityListener } from './AActivityLog.js';
import { logger } from '../utils/logging/logger.js';

export class MemoryActivityLog extends AActivityLog {
  private lines: string[] = [];
  private listeners = new Set<ActivityListener>();

  append(line: string): void {
    this.lines.push(line);

    for (const listener of this.listeners) {
      try {
        listener(line);
      } catch (error) {
        logger.warn('Activity listener failed', {
          component: 'ActivityLog',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  getLines(): readonly string[] {
    return [...this.lines];
  }

  subscribe(listener: ActivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.lines = [];
  }

  override async dispose(): Promise<void> {
    this.listeners.clear();
    this.lines = [];
  }
}
