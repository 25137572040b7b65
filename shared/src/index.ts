/**
 * Quota-bounded file store: storage core, collaborators and session layer
 */

// =============================================================================
// UTILITIES - Logging, errors, validation
// =============================================================================
export * from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================
export * from './config/index.js';

// =============================================================================
// SERVICES - Registry, bootstrap and collaborator tokens
// =============================================================================
export * from './services/index.js';

// =============================================================================
// DOMAIN MODULES
// =============================================================================

// Storage core
export * from './storage/index.js';

// Previews
export * from './preview/index.js';

// Activity log
export { MemoryActivityLog, type ActivityListener } from './activity/index.js';

// Authentication
export { FileCredentialStore, parseCredentialLines, isBcryptHash, resolveUserRoot, type CredentialRecord } from './auth/index.js';

// Session and command dispatch
export * from './session/index.js';
