export type { Entry, EntryKind, StorageLocation, CancellableOptions } from './types.js';
export { StorageTree } from './StorageTree.js';
export { QuotaTracker, type QuotaCheck, type QuotaUsage, type QuotaTrackerOptions } from './QuotaTracker.js';
export { EntryCatalog, filterEntries } from './EntryCatalog.js';
export { FileOps, nodeDeleteFileSystem, type FileOpsOptions, type DeleteFileSystem } from './FileOps.js';
export { RootLock, rootLock } from './RootLock.js';
