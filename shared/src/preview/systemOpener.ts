import open from 'open';
import { APlatformOpener } from './APlatformOpener.js';
import { logger } from '../utils/logging/logger.js';

/** The part of a spawned launcher the opener looks at */
export interface LaunchedProcess {
  readonly pid?: number | undefined;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type Launcher = (target: string) => Promise<LaunchedProcess>;

export class SystemOpener extends APlatformOpener {
  constructor(private readonly launch: Launcher = open) {
    super();
  }

  async openExternally(filePath: string): Promise<void> {
    logger.debug('Opening with default application', { component: 'SystemOpener', path: filePath });
    const child = await this.launch(filePath);

    child.once('error', (error) => {
      logger.error('Default application failed to start', error, { component: 'SystemOpener', path: filePath });
    });

    // A launcher that could not be spawned has no pid
    if (child.pid === undefined) {
      throw new Error('Default application failed to start');
    }
  }
}
