/**
 * Entry Catalog
 *
 * Lists the entries directly inside a tree's current folder, in the order
 * the filesystem yields them. Entries are rebuilt on every call.
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';

import { UPLOAD_TEMP_PREFIX } from '../config/constants.js';
import { logger } from '../utils/logging/logger.js';
import { IoFailureError, isNotFoundCode } from '../utils/errorTypes.js';
import type { StorageTree } from './StorageTree.js';
import type { Entry } from './types.js';

export class EntryCatalog {
  async list(tree: StorageTree): Promise<Entry[]> {
    const folder = await tree.getCanonicalCurrent();

    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(folder, { withFileTypes: true });
    } catch (error) {
      throw IoFailureError.from(error, 'list', tree.displayPath);
    }

    const entries: Entry[] = [];
    for (const dirent of dirents) {
      if (dirent.name.startsWith(UPLOAD_TEMP_PREFIX)) continue;
      const entry = await this.describe(folder, dirent);
      if (entry) entries.push(entry);
    }

    logger.debug('Listed folder', {
      component: 'EntryCatalog',
      root: tree.rootPath,
      path: tree.displayPath,
      count: entries.length,
    });
    return entries;
  }

  /**
   * Entries whose name contains `query`, ignoring case. An empty query keeps everything.
   */
  async filter(tree: StorageTree, query: string): Promise<Entry[]> {
    const entries = await this.list(tree);
    return filterEntries(entries, query);
  }

  private async describe(folder: string, dirent: Dirent): Promise<Entry | null> {
    const entryPath = path.join(folder, dirent.name);
    try {
      // stat follows links, so a link to a folder lists as a folder
      const stats = await fs.stat(entryPath);
      if (stats.isDirectory()) {
        return { name: dirent.name, kind: 'folder', sizeBytes: 0 };
      }
      return { name: dirent.name, kind: 'file', sizeBytes: stats.size };
    } catch (error) {
      if (!isNotFoundCode(error)) {
        throw IoFailureError.from(error, 'inspect', dirent.name);
      }
      // Dangling symlink still occupies the name
      if (dirent.isSymbolicLink()) {
        return { name: dirent.name, kind: 'file', sizeBytes: 0 };
      }
      // Removed between readdir and stat
      return null;
    }
  }
}

export function filterEntries(entries: readonly Entry[], query: string): Entry[] {
  const needle = query.toLowerCase();
  return entries.filter((entry) => entry.name.toLowerCase().includes(needle));
}
