/**
 * Quota Tracker
 *
 * Computes the recursive size of a storage root and answers whether a
 * size-increasing mutation fits under the configured maximum.
 *
 * The walk counts regular files only. Symlinks are not followed, so neither
 * a link cycle nor a second name for a file adds to the total.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';

import { MAX_STORAGE_BYTES } from '../config/env.js';
import { BYTES } from '../config/constants.js';
import { logger } from '../utils/logging/logger.js';
import { IoFailureError, isNotFoundCode } from '../utils/errorTypes.js';
import type { CancellableOptions } from './types.js';

export interface QuotaCheck {
  allowed: boolean;
  usedBytes: number;
  requestedBytes: number;
  maxBytes: number;
  availableBytes: number;
}

export interface QuotaUsage {
  usedBytes: number;
  maxBytes: number;
  availableBytes: number;
  /** Clamped to [0, 100], for display */
  percentUsed: number;
  /** Unclamped; above 100 when the quota was lowered below current usage */
  rawPercent: number;
  /** e.g. "12 MB / 50 MB used" */
  label: string;
}

export interface QuotaTrackerOptions {
  maxBytes?: number;
}

export class QuotaTracker {
  readonly maxBytes: number;

  constructor(options: QuotaTrackerOptions = {}) {
    const maxBytes = options.maxBytes ?? MAX_STORAGE_BYTES;
    if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
      throw new RangeError(`maxBytes must be a positive integer, got ${maxBytes}`);
    }
    this.maxBytes = maxBytes;
  }

  /**
   * Sum of the sizes of every regular file below `root`.
   * Links are never followed and count zero; a file with several hard links
   * counts once. A missing root counts as empty.
   */
  async usedBytes(root: string, options: CancellableOptions = {}): Promise<number> {
    let realRoot: string;
    try {
      realRoot = await fs.realpath(root);
    } catch (error) {
      if (isNotFoundCode(error)) return 0;
      throw IoFailureError.from(error, 'measure', root);
    }

    const seenFiles = new Set<string>();
    const pending: string[] = [realRoot];
    let total = 0;

    while (pending.length > 0) {
      options.signal?.throwIfAborted();

      const dir = pending.pop();
      if (dir === undefined) continue;

      let names: string[];
      try {
        names = await fs.readdir(dir);
      } catch (error) {
        // Removed while walking
        if (isNotFoundCode(error)) continue;
        throw IoFailureError.from(error, 'measure', dir);
      }

      for (const name of names) {
        const entryPath = path.join(dir, name);
        let stats: Stats;
        try {
          stats = await fs.lstat(entryPath);
        } catch (error) {
          if (isNotFoundCode(error)) continue;
          throw IoFailureError.from(error, 'measure', entryPath);
        }

        if (stats.isDirectory()) {
          pending.push(entryPath);
        } else if (stats.isFile()) {
          const identity = `${stats.dev}:${stats.ino}`;
          if (stats.nlink > 1 && seenFiles.has(identity)) continue;
          seenFiles.add(identity);
          total += stats.size;
        }
      }
    }

    logger.debug('Measured storage root', { component: 'QuotaTracker', root, usedBytes: total });
    return total;
  }

  /**
   * Evaluate whether `requestedBytes` more would still fit.
   */
  async checkQuota(root: string, requestedBytes: number, options: CancellableOptions = {}): Promise<QuotaCheck> {
    const usedBytes = await this.usedBytes(root, options);
    return {
      allowed: usedBytes + requestedBytes <= this.maxBytes,
      usedBytes,
      requestedBytes,
      maxBytes: this.maxBytes,
      availableBytes: Math.max(0, this.maxBytes - usedBytes),
    };
  }

  async wouldExceed(root: string, additionalBytes: number, options: CancellableOptions = {}): Promise<boolean> {
    const check = await this.checkQuota(root, additionalBytes, options);
    return !check.allowed;
  }

  async percentUsed(root: string): Promise<number> {
    return clampPercent(rawPercent(await this.usedBytes(root), this.maxBytes));
  }

  async getUsage(root: string): Promise<QuotaUsage> {
    const usedBytes = await this.usedBytes(root);
    const raw = rawPercent(usedBytes, this.maxBytes);
    return {
      usedBytes,
      maxBytes: this.maxBytes,
      availableBytes: Math.max(0, this.maxBytes - usedBytes),
      percentUsed: clampPercent(raw),
      rawPercent: raw,
      label: `${Math.floor(usedBytes / BYTES.MB)} MB / ${Math.floor(this.maxBytes / BYTES.MB)} MB used`,
    };
  }

  /**
   * Format bytes to human readable string
   */
  static formatBytes(bytes: number): string {
    if (bytes === 0) return '0 B';
    const k = BYTES.KB;
    const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
    return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
  }
}

function rawPercent(usedBytes: number, maxBytes: number): number {
  return Math.floor((usedBytes * 100) / maxBytes);
}

function clampPercent(percent: number): number {
  return Math.min(100, Math.max(0, percent));
}
