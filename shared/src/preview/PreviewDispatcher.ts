/**
 * Preview Dispatcher
 *
 * Picks a preview strategy from a file's extension and produces it:
 * - text-like files: the first `maxTextBytes` bytes decoded as UTF-8
 * - image-like files: dimensions, scaled to fit a square box without upscaling
 * - anything else: handed to the platform opener
 *
 * Never mutates storage.
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { imageSize } from 'image-size';

import {
  PREVIEW_IMAGE_EXTENSIONS,
  PREVIEW_IMAGE_SIZE,
  PREVIEW_MAX_TEXT_BYTES,
  PREVIEW_TEXT_EXTENSIONS,
} from '../config/env.js';
import { IMAGE_HEADER_READ_BYTES } from '../config/constants.js';
import { logger } from '../utils/logging/logger.js';
import {
  InvalidNameError,
  NotFoundError,
  PreviewUnavailableError,
  isNotFoundCode,
} from '../utils/errorTypes.js';
import type { StorageTree } from '../storage/StorageTree.js';
import type { APlatformOpener } from './APlatformOpener.js';

export type PreviewKind = 'text' | 'image' | 'external';

export interface TextPreview {
  kind: 'text';
  name: string;
  path: string;
  content: string;
  /** True when the file is longer than what was read */
  truncated: boolean;
  bytesRead: number;
  totalBytes: number;
}

export interface ImagePreview {
  kind: 'image';
  name: string;
  path: string;
  /** Format reported by the header parser, e.g. "png" */
  format: string;
  width: number;
  height: number;
  targetWidth: number;
  targetHeight: number;
}

export interface ExternalPreview {
  kind: 'external';
  name: string;
  path: string;
}

export type PreviewResult = TextPreview | ImagePreview | ExternalPreview;

export interface PreviewDispatcherOptions {
  opener: APlatformOpener;
  textExtensions?: readonly string[];
  imageExtensions?: readonly string[];
  maxTextBytes?: number;
  /** Edge of the square box images are fitted into */
  imageSize?: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Scale `width`×`height` to fit inside a `box`×`box` square, keeping the
 * aspect ratio. Images already inside the box keep their size.
 */
export function fitWithin(width: number, height: number, box: number): Dimensions {
  if (width <= box && height <= box) {
    return { width, height };
  }
  const scale = Math.min(box / width, box / height);
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

export class PreviewDispatcher {
  private readonly opener: APlatformOpener;
  private readonly textExtensions: ReadonlySet<string>;
  private readonly imageExtensions: ReadonlySet<string>;
  private readonly maxTextBytes: number;
  private readonly boxSize: number;

  constructor(options: PreviewDispatcherOptions) {
    this.opener = options.opener;
    this.textExtensions = new Set((options.textExtensions ?? PREVIEW_TEXT_EXTENSIONS).map((ext) => ext.toLowerCase()));
    this.imageExtensions = new Set((options.imageExtensions ?? PREVIEW_IMAGE_EXTENSIONS).map((ext) => ext.toLowerCase()));
    this.maxTextBytes = options.maxTextBytes ?? PREVIEW_MAX_TEXT_BYTES;
    this.boxSize = options.imageSize ?? PREVIEW_IMAGE_SIZE;
  }

  classify(name: string): PreviewKind {
    const extension = path.extname(name).toLowerCase();
    if (this.textExtensions.has(extension)) return 'text';
    if (this.imageExtensions.has(extension)) return 'image';
    return 'external';
  }

  /**
   * Preview file `name` in the tree's current folder.
   *
   * @throws NotFoundError when `name` does not exist
   * @throws InvalidNameError when `name` is a folder
   * @throws PreviewUnavailableError when the file cannot be read or opened
   */
  async preview(tree: StorageTree, name: string): Promise<PreviewResult> {
    const filePath = await tree.resolve(name);

    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      if (isNotFoundCode(error)) throw NotFoundError.entry(name);
      throw PreviewUnavailableError.from(error, name);
    }
    if (stats.isDirectory()) {
      throw InvalidNameError.isFolder(name);
    }

    const kind = this.classify(name);
    logger.debug('Dispatching preview', { component: 'PreviewDispatcher', name, kind });

    switch (kind) {
      case 'text':
        return this.previewText(name, filePath, stats);
      case 'image':
        return this.previewImage(name, filePath, stats);
      case 'external':
        try {
          await this.opener.openExternally(filePath);
        } catch (error) {
          throw PreviewUnavailableError.from(error, name);
        }
        return { kind: 'external', name, path: filePath };
    }
  }

  private async previewText(name: string, filePath: string, stats: Stats): Promise<TextPreview> {
    const bytes = await readHead(name, filePath, stats, this.maxTextBytes);
    const truncated = bytes.length < stats.size;

    let content: string;
    try {
      // stream: true tolerates a multi-byte character cut at the read limit
      content = new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: truncated });
    } catch (error) {
      throw PreviewUnavailableError.from(error, name);
    }

    return {
      kind: 'text',
      name,
      path: filePath,
      content,
      truncated,
      bytesRead: bytes.length,
      totalBytes: stats.size,
    };
  }

  private async previewImage(name: string, filePath: string, stats: Stats): Promise<ImagePreview> {
    const header = await readHead(name, filePath, stats, IMAGE_HEADER_READ_BYTES);

    let width: number | undefined;
    let height: number | undefined;
    let format: string | undefined;
    try {
      ({ width, height, type: format } = imageSize(header));
    } catch (error) {
      throw PreviewUnavailableError.from(error, name);
    }

    if (width === undefined || height === undefined || width <= 0 || height <= 0) {
      throw new PreviewUnavailableError(`Cannot open '${name}': image dimensions are unreadable`, name);
    }

    const target = fitWithin(width, height, this.boxSize);
    return {
      kind: 'image',
      name,
      path: filePath,
      format: format ?? path.extname(name).slice(1).toLowerCase(),
      width,
      height,
      targetWidth: target.width,
      targetHeight: target.height,
    };
  }
}

/**
 * Read at most `limit` bytes from the start of a regular file.
 */
async function readHead(name: string, filePath: string, stats: Stats, limit: number): Promise<Buffer> {
  if (!stats.isFile()) {
    throw new PreviewUnavailableError(`Cannot open '${name}': not a regular file`, name);
  }

  const length = Math.min(limit, stats.size);
  const buffer = Buffer.alloc(length);
  let offset = 0;

  try {
    const handle = await fs.open(filePath, 'r');
    try {
      while (offset < length) {
        const { bytesRead } = await handle.read(buffer, offset, length - offset, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw PreviewUnavailableError.from(error, name);
  }

  return buffer.subarray(0, offset);
}
