/**
 * Snapshot types
 */

import type { EntityLevel } from './entity.js';

/** Decoded document as received from the results API */
export type ElectionDocument = {
  [key: string]: unknown;
};

/** One immutable, timestamped historical record for an entity */
export interface Snapshot {
  entityId: string;
  level: EntityLevel;
  /** Minute-granularity UTC timestamp, also the on-disk identifier */
  timestamp: Date;
  content: ElectionDocument;
}

/** Result of a write-if-changed call */
export interface WriteResult {
  /** Whether a new snapshot was persisted */
  written: boolean;
  /** The new snapshot, or the untouched latest one when nothing was written */
  snapshot: Snapshot;
  /** Tracked fields that differ from the previous latest (empty on first write) */
  changedFields: string[];
}

/** Classification of a point in time for retention purposes */
export type RetentionPeriod = 'active' | 'quiet';
