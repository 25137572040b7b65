/**
 * Abstract Activity Log Service
 *
 * User-facing record of completed drive operations, one human-readable line
 * per operation ("Created folder: Notes"). Distinct from diagnostic logging.
 *
 * @see MemoryActivityLog for the in-memory implementation
 */
import { AService } from '../services/abstracts/AService.js';

export type ActivityListener = (line: string) => void;

export abstract class AActivityLog extends AService {
  /**
   * Append one line. Lines keep call order.
   */
  abstract append(line: string): void;

  /**
   * Lines appended so far, oldest first.
   */
  abstract getLines(): readonly string[];

  /**
   * Be told about every line appended from now on.
   *
   * @returns a function that removes the listener
   */
  abstract subscribe(listener: ActivityListener): () => void;

  abstract clear(): void;
}
