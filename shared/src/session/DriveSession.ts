/**
 * Drive Session
 *
 * One authenticated user's view of their storage root. Owns the StorageTree
 * cursor and wires the catalog, file operations and previews to the same
 * quota tracker and activity log.
 */

import { STORAGE_BASE_DIR } from '../config/env.js';
import { AActivityLog } from '../activity/AActivityLog.js';
import { ACredentialStore } from '../auth/ACredentialStore.js';
import { resolveUserRoot } from '../auth/userRoot.js';
import { APlatformOpener } from '../preview/APlatformOpener.js';
import { PreviewDispatcher, type PreviewDispatcherOptions } from '../preview/PreviewDispatcher.js';
import { ServiceProvider } from '../services/registry.js';
import { EntryCatalog } from '../storage/EntryCatalog.js';
import { FileOps } from '../storage/FileOps.js';
import { QuotaTracker } from '../storage/QuotaTracker.js';
import type { RootLock } from '../storage/RootLock.js';
import { StorageTree } from '../storage/StorageTree.js';
import { AuthenticationError } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

export interface DriveSessionOptions {
  username: string;
  password: string;
  /** Folder holding one root per username. Defaults to STORAGE_BASE_DIR */
  baseDir?: string;
  /** Quota of the root. Defaults to MAX_STORAGE_BYTES */
  maxBytes?: number;
  /** Collaborators default to the registered services */
  credentialStore?: ACredentialStore;
  activityLog?: AActivityLog;
  opener?: APlatformOpener;
  preview?: Omit<PreviewDispatcherOptions, 'opener'>;
  lock?: RootLock;
}

interface DriveSessionParts {
  username: string;
  tree: StorageTree;
  quota: QuotaTracker;
  activityLog: AActivityLog;
  catalog: EntryCatalog;
  fileOps: FileOps;
  previews: PreviewDispatcher;
}

export class DriveSession {
  readonly username: string;
  readonly tree: StorageTree;
  readonly quota: QuotaTracker;
  readonly activityLog: AActivityLog;
  readonly catalog: EntryCatalog;
  readonly fileOps: FileOps;
  readonly previews: PreviewDispatcher;

  private constructor(parts: DriveSessionParts) {
    this.username = parts.username;
    this.tree = parts.tree;
    this.quota = parts.quota;
    this.activityLog = parts.activityLog;
    this.catalog = parts.catalog;
    this.fileOps = parts.fileOps;
    this.previews = parts.previews;
  }

  /**
   * Authenticate and open the user's storage root, creating it if needed.
   *
   * @throws AuthenticationError when the credentials are rejected
   */
  static async open(options: DriveSessionOptions): Promise<DriveSession> {
    const credentialStore = options.credentialStore ?? ServiceProvider.get(ACredentialStore);
    const authenticated = await credentialStore.authenticate(options.username, options.password);
    if (!authenticated) {
      throw AuthenticationError.invalidCredentials();
    }

    const rootPath = resolveUserRoot(options.baseDir ?? STORAGE_BASE_DIR, options.username);
    const tree = await StorageTree.open(rootPath);

    const quota = new QuotaTracker({ maxBytes: options.maxBytes });
    const activityLog = options.activityLog ?? ServiceProvider.get(AActivityLog);
    const opener = options.opener ?? ServiceProvider.get(APlatformOpener);

    logger.info('Session opened', { component: 'DriveSession', root: rootPath, username: options.username });

    return new DriveSession({
      username: options.username,
      tree,
      quota,
      activityLog,
      catalog: new EntryCatalog(),
      fileOps: new FileOps({ quota, activityLog, lock: options.lock }),
      previews: new PreviewDispatcher({ ...options.preview, opener }),
    });
  }

  /**
   * Append an activity line for navigation and file-open. Best effort.
   */
  recordActivity(line: string): void {
    try {
      this.activityLog.append(line);
    } catch (error) {
      logger.warn('Failed to append activity line', {
        component: 'DriveSession',
        line,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
