/**
 * Shared validation utilities for MiniDrive
 */

export * from './pathValidation.js';
