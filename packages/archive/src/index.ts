/**
 * @results-archive/archive
 *
 * Change-only snapshot history of election results per monitored entity,
 * with period-dependent retention.
 */

// Entity Registry
export * from './registry/index.js';

// Change Detection
export * from './changes/index.js';

// Snapshot Storage
export * from './snapshots/index.js';

// Retention
export * from './retention/index.js';

// Facade
export { Archive, createArchive } from './archive.js';
export type { ArchiveOptions, EntityRef } from './archive.js';
