/**
 * Snapshot storage
 */

export { SnapshotStore } from './snapshot-store.js';
export type { PruneFailure, PruneResult } from './snapshot-store.js';
export type { SnapshotBackend } from './backend.js';
export { FileSnapshotBackend } from './file-backend.js';
export { MemorySnapshotBackend } from './memory-backend.js';
