/**
 * Storage data model
 */

export type EntryKind = 'file' | 'folder';

/**
 * One filesystem object inside the current folder.
 * Materialized per listing call and never cached.
 */
export interface Entry {
  readonly name: string;
  readonly kind: EntryKind;
  /** 0 for folders */
  readonly sizeBytes: number;
}

/**
 * Snapshot of a StorageTree's boundary and cursor.
 */
export interface StorageLocation {
  rootPath: string;
  currentPath: string;
  /** Folder names from the root down to the current folder */
  segments: readonly string[];
}

/**
 * Options accepted by long-running operations.
 */
export interface CancellableOptions {
  signal?: AbortSignal;
}
