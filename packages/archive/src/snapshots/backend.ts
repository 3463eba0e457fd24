/**
 * Storage port for snapshot bodies and latest pointers.
 *
 * Backends only move bytes; ordering, change detection, locking and the
 * retention exemption of the latest snapshot live in SnapshotStore.
 */

import type { ElectionDocument, Entity } from '@results-archive/core';

export interface SnapshotBackend {
  /** Timestamp the latest pointer references, undefined if none was written */
  readLatest(entity: Entity): Promise<Date | undefined>;

  /** Atomically replace the latest pointer */
  writeLatest(entity: Entity, timestamp: Date): Promise<void>;

  /** Snapshot body, undefined if it does not exist */
  readSnapshot(entity: Entity, timestamp: Date): Promise<ElectionDocument | undefined>;

  /** Durably persist a snapshot body; must never expose a partial body to readers */
  writeSnapshot(entity: Entity, timestamp: Date, content: ElectionDocument): Promise<void>;

  /** Every stored body, oldest first, whether or not the pointer has reached it */
  listTimestamps(entity: Entity): Promise<Date[]>;

  /** Remove a body; removing a missing body is not an error */
  deleteSnapshot(entity: Entity, timestamp: Date): Promise<void>;
}
