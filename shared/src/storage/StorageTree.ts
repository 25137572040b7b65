/**
 * Storage Tree - root boundary and current-folder cursor
 *
 * Owns one user's storage root and the folder the user is looking at.
 * The cursor is kept as folder names below the root, so `up()` can never
 * climb past the root and `enter()` only ever descends by one validated name.
 * Every name is checked against the canonical (symlink-free) form of the
 * current folder before it is used.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import { logger } from '../utils/logging/logger.js';
import {
  InvalidNameError,
  IoFailureError,
  NotFoundError,
  isNotFoundCode,
} from '../utils/errorTypes.js';
import { assertValidEntryName, isWithinRoot } from '../utils/validators/pathValidation.js';
import type { StorageLocation } from './types.js';

export class StorageTree {
  /** Absolute root of this storage area, fixed for the tree's lifetime */
  readonly rootPath: string;

  private segments: string[] = [];
  private canonicalRoot: string | null = null;

  constructor(rootPath: string) {
    this.rootPath = path.resolve(rootPath);
  }

  /**
   * Create a tree and make sure its root folder exists.
   */
  static async open(rootPath: string): Promise<StorageTree> {
    const tree = new StorageTree(rootPath);
    await tree.ensureRoot();
    return tree;
  }

  /**
   * Absolute path of the folder the cursor points at.
   */
  get currentPath(): string {
    return path.join(this.rootPath, ...this.segments);
  }

  /**
   * Display path relative to the root, e.g. `/Notes/2024`.
   */
  get displayPath(): string {
    return `/${this.segments.join('/')}`;
  }

  isAtRoot(): boolean {
    return this.segments.length === 0;
  }

  location(): StorageLocation {
    return {
      rootPath: this.rootPath,
      currentPath: this.currentPath,
      segments: [...this.segments],
    };
  }

  /**
   * Create the root folder if it is missing. Idempotent.
   *
   * @throws IoFailureError when the root cannot be created (e.g. a file is in the way)
   */
  async ensureRoot(): Promise<void> {
    let canonical: string;
    try {
      await fs.mkdir(this.rootPath, { recursive: true });
      canonical = await fs.realpath(this.rootPath);
    } catch (error) {
      throw IoFailureError.from(error, 'create storage root', this.rootPath);
    }

    const stats = await fs.stat(canonical).catch((error: unknown) => {
      throw IoFailureError.from(error, 'inspect storage root', this.rootPath);
    });
    if (!stats.isDirectory()) {
      throw new IoFailureError(`Storage root '${this.rootPath}' is not a folder`, 'ENOTDIR', { target: this.rootPath });
    }
    this.canonicalRoot = canonical;
  }

  /**
   * Root with every symlink resolved. Creates the root on first use.
   */
  async getCanonicalRoot(): Promise<string> {
    if (this.canonicalRoot === null) {
      await this.ensureRoot();
    }
    return this.canonicalRoot ?? this.rootPath;
  }

  /**
   * Canonical form of the current folder.
   *
   * @throws NotFoundError when the folder was removed underneath the cursor
   */
  async getCanonicalCurrent(): Promise<string> {
    const root = await this.getCanonicalRoot();
    if (this.isAtRoot()) return root;

    let real: string;
    try {
      real = await fs.realpath(this.currentPath);
    } catch (error) {
      if (isNotFoundCode(error)) {
        throw NotFoundError.folder(this.segments[this.segments.length - 1] ?? '');
      }
      throw IoFailureError.from(error, 'resolve', this.displayPath);
    }

    if (!isWithinRoot(root, real)) {
      throw InvalidNameError.outsideFolder(this.displayPath);
    }
    return real;
  }

  /**
   * Path of `name` inside the current folder.
   *
   * The parent part is canonical; the last component is kept as-is so a
   * symlink is addressed as itself rather than as its target. Names that
   * carry separators, or whose target lies outside the current folder, are
   * rejected.
   *
   * @throws InvalidNameError
   */
  async resolve(name: string): Promise<string> {
    assertValidEntryName(name);

    const current = await this.getCanonicalCurrent();
    const candidate = path.join(current, name);

    let real: string;
    try {
      real = await fs.realpath(candidate);
    } catch (error) {
      // Nothing there yet (or a dangling link): the lexical path is already inside
      if (isNotFoundCode(error)) return candidate;
      throw IoFailureError.from(error, 'resolve', name);
    }

    if (!isWithinRoot(current, real)) {
      logger.warn('Rejected name resolving outside the current folder', {
        component: 'StorageTree',
        root: this.rootPath,
        name,
      });
      throw InvalidNameError.outsideFolder(name);
    }

    return candidate;
  }

  /**
   * Move the cursor into the child folder `name`.
   *
   * @throws NotFoundError when `name` is not an existing folder
   */
  async enter(name: string): Promise<void> {
    const target = await this.resolve(name);

    let isFolder = false;
    try {
      isFolder = (await fs.stat(target)).isDirectory();
    } catch (error) {
      if (!isNotFoundCode(error)) {
        throw IoFailureError.from(error, 'open folder', name);
      }
    }

    if (!isFolder) {
      throw NotFoundError.folder(name);
    }

    this.segments.push(name);
    logger.debug('Entered folder', { component: 'StorageTree', root: this.rootPath, path: this.displayPath });
  }

  /**
   * Move the cursor to the parent folder. No-op at the root.
   *
   * @returns whether the cursor moved
   */
  up(): boolean {
    if (this.isAtRoot()) return false;
    this.segments.pop();
    return true;
  }
}
