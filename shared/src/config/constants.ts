/**
 * Centralized Constants
 *
 * Built-in defaults for every configurable limit. env.ts reads the
 * environment and falls back to these values; components take the
 * env-derived values as option defaults.
 *
 * Usage:
 *   import { BYTES, DEFAULT_MAX_STORAGE_BYTES } from '../config/constants.js';
 */

// =============================================================================
// UNITS
// =============================================================================

export const BYTES = {
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
} as const;

// =============================================================================
// STORAGE
// =============================================================================

/** Quota per storage root: 50 MB */
export const DEFAULT_MAX_STORAGE_BYTES = 50 * BYTES.MB;

/** Longest entry name accepted (common filesystem limit) */
export const MAX_ENTRY_NAME_LENGTH = 255;

/**
 * Prefix of the hidden file an upload streams into before it is renamed
 * into place. Entries carrying it never appear in listings.
 */
export const UPLOAD_TEMP_PREFIX = '.minidrive-upload-';

// =============================================================================
// CREDENTIALS
// =============================================================================

export const DEFAULT_BCRYPT_ROUNDS = 10;

// =============================================================================
// PREVIEWS
// =============================================================================

/** Upper bound of bytes read when rendering a text preview: 64 KB */
export const DEFAULT_PREVIEW_MAX_TEXT_BYTES = 64 * BYTES.KB;

/** Edge of the square box images are scaled into */
export const DEFAULT_PREVIEW_IMAGE_SIZE = 250;

/** Bytes of an image read to find its dimensions (JPEG headers can sit behind EXIF data) */
export const IMAGE_HEADER_READ_BYTES = 512 * BYTES.KB;

export const DEFAULT_TEXT_PREVIEW_EXTENSIONS = ['.txt', '.md', '.log', '.csv', '.json'] as const;

export const DEFAULT_IMAGE_PREVIEW_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif'] as const;
