/**
 * Entry Name Validation Utilities
 * Prevents directory traversal through entry and user names
 */

import * as path from 'path';

import { MAX_ENTRY_NAME_LENGTH, UPLOAD_TEMP_PREFIX } from '../../config/constants.js';
import { InvalidNameError } from '../errorTypes.js';

// =============================================================================
// CONSTANTS
// =============================================================================

/** Separators rejected in names on every platform */
export const PATH_SEPARATOR_PATTERN = /[\\/]/;

/** Names that would address the current or parent folder */
export const RESERVED_NAMES: readonly string[] = ['.', '..'];

// =============================================================================
// TYPES
// =============================================================================

export interface NameValidationResult {
  valid: boolean;
  error?: string;
}

// =============================================================================
// VALIDATION FUNCTIONS
// =============================================================================

/**
 * Validate a single entry name (file, folder or username segment)
 *
 * Checks for:
 * - Empty or whitespace-only names
 * - Null bytes (can be used to truncate paths)
 * - Path separators (`/` and `\`)
 * - `.` and `..`
 * - The in-flight upload prefix, which listings hide
 * - Excessive length (>255 characters)
 *
 * @example
 * ```typescript
 * validateEntryName('notes.txt');     // { valid: true }
 * validateEntryName('../etc');        // { valid: false, error: 'Name cannot contain path separators' }
 * validateEntryName('   ');           // { valid: false, error: 'Name cannot be empty' }
 * ```
 */
export function validateEntryName(name: string): NameValidationResult {
  if (!name || name.trim().length === 0) {
    return { valid: false, error: 'Name cannot be empty' };
  }

  if (name.includes('\0')) {
    return { valid: false, error: 'Name contains null bytes' };
  }

  if (PATH_SEPARATOR_PATTERN.test(name)) {
    return { valid: false, error: 'Name cannot contain path separators' };
  }

  if (RESERVED_NAMES.includes(name)) {
    return { valid: false, error: `'${name}' is a reserved name` };
  }

  if (name.startsWith(UPLOAD_TEMP_PREFIX)) {
    return { valid: false, error: `Names starting with '${UPLOAD_TEMP_PREFIX}' are reserved` };
  }

  if (name.length > MAX_ENTRY_NAME_LENGTH) {
    return { valid: false, error: `Name exceeds maximum length of ${MAX_ENTRY_NAME_LENGTH} characters` };
  }

  return { valid: true };
}

/**
 * Validate a name and throw an InvalidNameError if invalid
 *
 * @throws InvalidNameError
 */
export function assertValidEntryName(name: string): void {
  const result = validateEntryName(name);
  if (!result.valid) {
    throw new InvalidNameError(result.error ?? 'Invalid name', name);
  }
}

/**
 * Check if a name is valid (simple boolean check)
 */
export function isValidEntryName(name: string): boolean {
  return validateEntryName(name).valid;
}

/**
 * Whether `candidate` is `root` itself or lies beneath it.
 * Both paths must already be absolute and canonical.
 *
 * @example
 * ```typescript
 * isWithinRoot('/srv/alice', '/srv/alice/docs');  // true
 * isWithinRoot('/srv/alice', '/srv/alice2');      // false
 * ```
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') return true;
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}
