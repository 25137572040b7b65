/**
 * Abstract Platform Opener Service
 *
 * Hands a file to the operating system's default application. Used by the
 * preview dispatcher for files it cannot render itself.
 */
import { AService } from '../services/abstracts/AService.js';

export abstract class APlatformOpener extends AService {
  /**
   * @throws when the platform could not launch an application for `filePath`
   */
  abstract openExternally(filePath: string): Promise<void>;
}
