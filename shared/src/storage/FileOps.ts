/**
 * File Operations
 *
 * Create-folder, upload, delete and download against a StorageTree's current
 * folder. Mutations on one storage root run one at a time under the root
 * lock, so the quota gate of an upload sees the size that the copy lands on.
 *
 * Every successful operation appends exactly one activity line; failures
 * append nothing.
 */

import { randomUUID } from 'crypto';
import { createReadStream, createWriteStream } from 'fs';
import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { pipeline } from 'stream/promises';

import { UPLOAD_TEMP_PREFIX } from '../config/constants.js';
import type { AActivityLog } from '../activity/AActivityLog.js';
import { logger } from '../utils/logging/logger.js';
import {
  InvalidNameError,
  IoFailureError,
  NotFoundError,
  QuotaExceededError,
  getErrorCode,
  isNotFoundCode,
  toIoFailure,
  type DeleteReport,
} from '../utils/errorTypes.js';
import { assertValidEntryName, isWithinRoot } from '../utils/validators/pathValidation.js';
import type { QuotaTracker } from './QuotaTracker.js';
import { rootLock, type RootLock } from './RootLock.js';
import type { StorageTree } from './StorageTree.js';
import type { CancellableOptions, Entry } from './types.js';

/** The filesystem calls a delete makes */
export interface DeleteFileSystem {
  lstat(target: string): Promise<Stats>;
  readdir(target: string): Promise<string[]>;
  unlink(target: string): Promise<void>;
  rmdir(target: string): Promise<void>;
}

export const nodeDeleteFileSystem: DeleteFileSystem = {
  lstat: (target) => fs.lstat(target),
  readdir: (target) => fs.readdir(target),
  unlink: (target) => fs.unlink(target),
  rmdir: (target) => fs.rmdir(target),
};

export interface FileOpsOptions {
  quota: QuotaTracker;
  activityLog: AActivityLog;
  /** Defaults to the process-wide lock */
  lock?: RootLock;
  /** Defaults to Node's fs */
  deleteFs?: DeleteFileSystem;
}

export class FileOps {
  private readonly quota: QuotaTracker;
  private readonly activityLog: AActivityLog;
  private readonly lock: RootLock;
  private readonly deleteFs: DeleteFileSystem;

  constructor(options: FileOpsOptions) {
    this.quota = options.quota;
    this.activityLog = options.activityLog;
    this.lock = options.lock ?? rootLock;
    this.deleteFs = options.deleteFs ?? nodeDeleteFileSystem;
  }

  /**
   * Create an empty folder in the current folder.
   *
   * @throws InvalidNameError for a blank or malformed name
   * @throws IoFailureError when an entry of that name already exists
   */
  async createFolder(tree: StorageTree, name: string): Promise<Entry> {
    assertValidEntryName(name);

    return this.withRootLock(tree, async () => {
      const target = await tree.resolve(name);
      try {
        await fs.mkdir(target);
      } catch (error) {
        if (getErrorCode(error) === 'EEXIST') {
          throw IoFailureError.alreadyExists(name);
        }
        throw IoFailureError.from(error, 'create folder', name);
      }

      logger.info('Folder created', { component: 'FileOps', root: tree.rootPath, name });
      this.record(`Created folder: ${name}`);
      return { name, kind: 'folder', sizeBytes: 0 };
    });
  }

  /**
   * Copy `sourcePath` into the current folder as `destName`.
   *
   * The quota is checked before any byte is written. The copy goes to a
   * hidden temporary file that is renamed into place once complete, and is
   * removed on any failure or abort.
   *
   * @throws NotFoundError when the source is missing
   * @throws QuotaExceededError when the file would push usage over the quota
   * @throws IoFailureError when the destination exists or the copy fails
   */
  async upload(
    tree: StorageTree,
    sourcePath: string,
    destName: string = path.basename(sourcePath),
    options: CancellableOptions = {}
  ): Promise<Entry> {
    assertValidEntryName(destName);
    const sourceStats = await statSource(sourcePath);
    const size = sourceStats.size;

    return this.withRootLock(tree, async (root) => {
      const operationId = `upload:${root}:${destName}`;
      let tempPath: string | null = null;

      try {
        const check = await this.quota.checkQuota(root, size, options);
        if (!check.allowed) {
          logger.warn('Upload rejected by quota', {
            component: 'FileOps',
            root: tree.rootPath,
            name: destName,
            usedBytes: check.usedBytes,
            requestedBytes: size,
            maxBytes: check.maxBytes,
          });
          throw new QuotaExceededError(check);
        }

        const target = await tree.resolve(destName);
        if (await pathExists(target)) {
          throw IoFailureError.alreadyExists(destName);
        }

        logger.startOperation(operationId);
        tempPath = path.join(path.dirname(target), `${UPLOAD_TEMP_PREFIX}${randomUUID()}`);
        await pipeline(
          createReadStream(sourcePath),
          createWriteStream(tempPath, { flags: 'wx' }),
          { signal: options.signal }
        );

        const written = (await fs.stat(tempPath)).size;
        if (written > size) {
          // Source grew after it was measured; the temporary file is already counted
          const recheck = await this.quota.checkQuota(root, 0, options);
          if (!recheck.allowed) {
            throw new QuotaExceededError({
              usedBytes: recheck.usedBytes - written,
              requestedBytes: written,
              maxBytes: recheck.maxBytes,
            });
          }
        }

        await fs.rename(tempPath, target);
        tempPath = null;

        logger.timed('info', 'File uploaded', operationId, {
          component: 'FileOps',
          root: tree.rootPath,
          name: destName,
          sizeBytes: written,
        });
        this.record(`Uploaded file: ${destName}`);
        return { name: destName, kind: 'file', sizeBytes: written };
      } catch (error) {
        logger.endOperation(operationId);
        if (tempPath !== null) {
          await removeQuietly(tempPath);
        }
        throw toIoFailure(error, 'upload', destName);
      }
    });
  }

  /**
   * Delete `name` from the current folder; folders are emptied depth-first.
   *
   * @returns the paths removed, relative to the current folder
   * @throws NotFoundError when nothing of that name exists
   * @throws IoFailureError carrying the DeleteReport when anything was left behind
   */
  async delete(tree: StorageTree, name: string): Promise<DeleteReport> {
    return this.withRootLock(tree, async () => {
      const target = await tree.resolve(name);

      let stats: Stats;
      try {
        stats = await this.deleteFs.lstat(target);
      } catch (error) {
        if (isNotFoundCode(error)) throw NotFoundError.entry(name);
        throw IoFailureError.from(error, 'delete', name);
      }

      const report: DeleteReport = { removed: [], failed: [] };
      await removeTree(this.deleteFs, target, name, stats, report);

      if (report.failed.length > 0) {
        logger.warn('Delete completed partially', {
          component: 'FileOps',
          root: tree.rootPath,
          name,
          removed: report.removed.length,
          failed: report.failed.length,
        });
        throw IoFailureError.partialDelete(name, report);
      }

      logger.info('Entry deleted', { component: 'FileOps', root: tree.rootPath, name, removed: report.removed.length });
      this.record(`Deleted: ${name}`);
      return report;
    });
  }

  /**
   * Copy file `name` out of the storage area to `destinationPath`.
   * An existing destination is never overwritten, and a destination inside
   * the storage root is refused.
   *
   * @throws InvalidNameError when `name` is a folder or the destination is inside the root
   * @throws NotFoundError when `name` does not exist
   * @throws IoFailureError on any read or write error
   */
  async download(
    tree: StorageTree,
    name: string,
    destinationPath: string,
    options: CancellableOptions = {}
  ): Promise<Entry> {
    const source = await tree.resolve(name);

    const destination = await canonicalDestination(destinationPath);
    if (isWithinRoot(await tree.getCanonicalRoot(), destination)) {
      throw InvalidNameError.insideStorage(destinationPath);
    }

    let stats: Stats;
    try {
      stats = await fs.stat(source);
    } catch (error) {
      if (isNotFoundCode(error)) throw NotFoundError.entry(name);
      throw IoFailureError.from(error, 'download', name);
    }
    if (stats.isDirectory()) {
      throw InvalidNameError.isFolder(name);
    }

    const operationId = `download:${source}`;
    logger.startOperation(operationId);
    try {
      await pipeline(
        createReadStream(source),
        createWriteStream(destinationPath, { flags: 'wx' }),
        { signal: options.signal }
      );
    } catch (error) {
      logger.endOperation(operationId);
      if (getErrorCode(error) === 'EEXIST') {
        throw IoFailureError.alreadyExists(destinationPath);
      }
      throw IoFailureError.from(error, 'download', name);
    }

    logger.timed('info', 'File downloaded', operationId, {
      component: 'FileOps',
      root: tree.rootPath,
      name,
      destination: destinationPath,
    });
    this.record(`Downloaded file: ${name}`);
    return { name, kind: 'file', sizeBytes: stats.size };
  }

  private async withRootLock<T>(tree: StorageTree, task: (root: string) => Promise<T>): Promise<T> {
    const root = await tree.getCanonicalRoot();
    return this.lock.run(root, () => task(root));
  }

  /**
   * Activity lines are best effort: a failing sink never fails the operation.
   */
  private record(line: string): void {
    try {
      this.activityLog.append(line);
    } catch (error) {
      logger.warn('Failed to append activity line', {
        component: 'FileOps',
        line,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

async function statSource(sourcePath: string): Promise<Stats> {
  let stats: Stats;
  try {
    stats = await fs.stat(sourcePath);
  } catch (error) {
    if (isNotFoundCode(error)) throw NotFoundError.entry(sourcePath);
    throw IoFailureError.from(error, 'read', sourcePath);
  }
  if (stats.isDirectory()) {
    throw InvalidNameError.isFolder(sourcePath);
  }
  if (!stats.isFile()) {
    throw new IoFailureError(`'${sourcePath}' is not a regular file`, 'EINVAL', { target: sourcePath });
  }
  return stats;
}

/**
 * Absolute destination with its parent folder's links resolved.
 * A missing parent is left as given; the write then fails with ENOENT.
 */
async function canonicalDestination(destinationPath: string): Promise<string> {
  const absolute = path.resolve(destinationPath);
  try {
    return path.join(await fs.realpath(path.dirname(absolute)), path.basename(absolute));
  } catch (error) {
    if (isNotFoundCode(error)) return absolute;
    throw IoFailureError.from(error, 'download', destinationPath);
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isNotFoundCode(error)) return false;
    throw IoFailureError.from(error, 'inspect', path.basename(target));
  }
}

async function removeQuietly(target: string): Promise<void> {
  try {
    await fs.rm(target, { force: true });
  } catch (error) {
    logger.warn('Failed to remove temporary upload file', {
      component: 'FileOps',
      path: target,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function reasonOf(error: unknown): string {
  const code = getErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return code ? `${code}: ${message}` : message;
}

/**
 * Depth-first removal. Symlinks are removed as links, never followed.
 *
 * @returns whether `absolutePath` no longer exists
 */
async function removeTree(
  fileSystem: DeleteFileSystem,
  absolutePath: string,
  relativePath: string,
  stats: Stats,
  report: DeleteReport
): Promise<boolean> {
  if (!stats.isDirectory()) {
    try {
      await fileSystem.unlink(absolutePath);
    } catch (error) {
      if (!isNotFoundCode(error)) {
        report.failed.push({ path: relativePath, reason: reasonOf(error) });
        return false;
      }
    }
    report.removed.push(relativePath);
    return true;
  }

  let names: string[];
  try {
    names = await fileSystem.readdir(absolutePath);
  } catch (error) {
    report.failed.push({ path: relativePath, reason: reasonOf(error) });
    return false;
  }

  let emptied = true;
  for (const name of names) {
    const childPath = path.join(absolutePath, name);
    const childRelative = `${relativePath}/${name}`;

    let childStats: Stats;
    try {
      childStats = await fileSystem.lstat(childPath);
    } catch (error) {
      if (isNotFoundCode(error)) continue;
      report.failed.push({ path: childRelative, reason: reasonOf(error) });
      emptied = false;
      continue;
    }

    if (!(await removeTree(fileSystem, childPath, childRelative, childStats, report))) {
      emptied = false;
    }
  }

  if (!emptied) {
    report.failed.push({ path: relativePath, reason: 'Some contents could not be removed' });
    return false;
  }

  try {
    await fileSystem.rmdir(absolutePath);
  } catch (error) {
    report.failed.push({ path: relativePath, reason: reasonOf(error) });
    return false;
  }
  report.removed.push(relativePath);
  return true;
}
