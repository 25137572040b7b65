/**
 * Centralized Environment Configuration
 *
 * This module is the SINGLE SOURCE OF TRUTH for all environment variables.
 * All environment variable access MUST go through this module.
 *
 * Features:
 * - Zod schema validation with type safety
 * - Default values with environment-specific overrides
 * - Fail-fast validation in production
 * - Clear error messages for missing/invalid config
 *
 * Usage:
 *   import { MAX_STORAGE_BYTES, STORAGE_BASE_DIR } from '@minidrive/shared';
 *
 * DO NOT use process.env directly elsewhere in the codebase.
 */

import * as path from 'path';
import { z } from 'zod';

import {
  DEFAULT_BCRYPT_ROUNDS,
  DEFAULT_IMAGE_PREVIEW_EXTENSIONS,
  DEFAULT_MAX_STORAGE_BYTES,
  DEFAULT_PREVIEW_IMAGE_SIZE,
  DEFAULT_PREVIEW_MAX_TEXT_BYTES,
  DEFAULT_TEXT_PREVIEW_EXTENSIONS,
} from './constants.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse positive integer env vars with default
 */
const positiveIntegerWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .refine((val) => Number.isInteger(val) && val > 0, { message: 'Must be a positive integer' });

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

/**
 * Helper for comma separated extension lists (".txt, .MD" -> ['.txt', '.md'])
 */
const extensionList = (defaultValue: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((val) => {
      if (!val) return [...defaultValue];
      return val
        .split(',')
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0)
        .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
    });

/**
 * Main environment configuration schema
 */
const envSchema = z.object({
  // -------------------------------------------------------------------------
  // Node Environment
  // -------------------------------------------------------------------------
  NODE_ENV: optionalString('development'),

  // -------------------------------------------------------------------------
  // Storage
  // -------------------------------------------------------------------------
  STORAGE_BASE_DIR: optionalString(path.join(process.cwd(), 'storage')),
  MAX_STORAGE_BYTES: positiveIntegerWithDefault(DEFAULT_MAX_STORAGE_BYTES),

  // -------------------------------------------------------------------------
  // Credentials
  // -------------------------------------------------------------------------
  CREDENTIALS_FILE: optionalString(path.join(process.cwd(), 'users.txt')),
  BCRYPT_ROUNDS: positiveIntegerWithDefault(DEFAULT_BCRYPT_ROUNDS),

  // -------------------------------------------------------------------------
  // Previews
  // -------------------------------------------------------------------------
  PREVIEW_MAX_TEXT_BYTES: positiveIntegerWithDefault(DEFAULT_PREVIEW_MAX_TEXT_BYTES),
  PREVIEW_IMAGE_SIZE: positiveIntegerWithDefault(DEFAULT_PREVIEW_IMAGE_SIZE),
  PREVIEW_TEXT_EXTENSIONS: extensionList(DEFAULT_TEXT_PREVIEW_EXTENSIONS),
  PREVIEW_IMAGE_EXTENSIONS: extensionList(DEFAULT_IMAGE_PREVIEW_EXTENSIONS),

  // -------------------------------------------------------------------------
  // Verbose/Debug Mode Configuration
  // -------------------------------------------------------------------------
  VERBOSE_MODE: z.enum(['off', 'on', 'debug']).optional().default('off'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(), // Computed below if not set
});

export type EnvConfig = z.infer<typeof envSchema>;

// =============================================================================
// PARSE AND VALIDATE
// =============================================================================

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Environment validation failed:');
  for (const error of parseResult.error.errors) {
    console.error(`  ${error.path.join('.')}: ${error.message}`);
  }
  // Don't exit immediately - allow the app to start with defaults in development
  if (process.env.NODE_ENV === 'production') {
    console.error('Exiting due to invalid environment configuration');
    process.exit(1);
  }
}

// Use parsed config or fall back to the schema defaults
const parsedEnv: EnvConfig = parseResult.success ? parseResult.data : envSchema.parse({});

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

// Node Environment
export const NODE_ENV = parsedEnv.NODE_ENV;

// Storage
export const STORAGE_BASE_DIR = path.resolve(parsedEnv.STORAGE_BASE_DIR);
export const MAX_STORAGE_BYTES = parsedEnv.MAX_STORAGE_BYTES;

// Credentials
export const CREDENTIALS_FILE = path.resolve(parsedEnv.CREDENTIALS_FILE);
export const BCRYPT_ROUNDS = parsedEnv.BCRYPT_ROUNDS;

// Previews
export const PREVIEW_MAX_TEXT_BYTES = parsedEnv.PREVIEW_MAX_TEXT_BYTES;
export const PREVIEW_IMAGE_SIZE = parsedEnv.PREVIEW_IMAGE_SIZE;
export const PREVIEW_TEXT_EXTENSIONS: readonly string[] = parsedEnv.PREVIEW_TEXT_EXTENSIONS;
export const PREVIEW_IMAGE_EXTENSIONS: readonly string[] = parsedEnv.PREVIEW_IMAGE_EXTENSIONS;

// Verbose/Debug Mode Configuration
export const VERBOSE_MODE = parsedEnv.VERBOSE_MODE;
export const LOG_LEVEL = parsedEnv.LOG_LEVEL ?? (VERBOSE_MODE === 'debug' ? 'debug' : 'info');
export const VERBOSE_TIMING = VERBOSE_MODE !== 'off';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Check if verbose mode is enabled
 */
export function isVerbose(): boolean {
  return VERBOSE_MODE !== 'off';
}

/**
 * Check if debug level logging is enabled
 */
export function isDebugLevel(): boolean {
  return VERBOSE_MODE === 'debug' || LOG_LEVEL === 'debug';
}

/**
 * Check if running in production
 */
export function isProduction(): boolean {
  return NODE_ENV === 'production';
}
