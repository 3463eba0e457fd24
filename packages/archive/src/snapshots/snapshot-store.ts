/**
 * Snapshot Store
 *
 * Append-only, per-entity history of change-triggered snapshots plus the
 * latest pointer. All mutations of one entity run under that entity's lock;
 * different entities proceed in parallel.
 */

import {
  ArchiveError,
  KeyedLock,
  formatSnapshotId,
  isValidDate,
  truncateToMinute,
  wrapError,
  type ElectionDocument,
  type Entity,
  type Snapshot,
  type WriteResult,
} from '@results-archive/core';
import { ChangeDetector } from '../changes/index.js';
import type { SnapshotBackend } from './backend.js';

export interface PruneFailure {
  timestamp: Date;
  error: ArchiveError;
}

export interface PruneResult {
  /** Latest pointer at the time of pruning (undefined: entity never ingested) */
  latest?: Date;
  deleted: Date[];
  failures: PruneFailure[];
}

function isPlainDocument(value: unknown): value is ElectionDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SnapshotStore {
  private readonly lastSeen = new Map<string, number>();

  constructor(
    private readonly backend: SnapshotBackend,
    private readonly detector: ChangeDetector = new ChangeDetector(),
    private readonly lock: KeyedLock = new KeyedLock()
  ) {}

  /**
   * Persist `document` as a new snapshot if it differs from the latest one.
   *
   * The body is made durable before the latest pointer moves, so a crash in
   * between leaves the previous pointer valid.
   *
   * @throws ArchiveError OUT_OF_ORDER_TIMESTAMP, INVALID_DOCUMENT,
   *   STORAGE_READ_FAILURE or STORAGE_WRITE_FAILURE; entity state is unchanged
   *   in every case
   */
  async writeIfChanged(
    entity: Entity,
    document: ElectionDocument,
    timestamp: Date
  ): Promise<WriteResult> {
    if (!isPlainDocument(document)) {
      throw new ArchiveError({
        code: 'INVALID_DOCUMENT',
        message: `Document for '${entity.id}' must be a JSON object`,
        context: { entityId: entity.id },
      });
    }
    if (!isValidDate(timestamp)) {
      throw new ArchiveError({
        code: 'OUT_OF_ORDER_TIMESTAMP',
        message: `Invalid timestamp for '${entity.id}'`,
        context: { entityId: entity.id },
      });
    }

    const at = truncateToMinute(timestamp);

    return this.lock.run(entity.id, async () => {
      const pointer = await this.readPointer(entity);
      this.assertAfterPrevious(entity, at, pointer);

      const previous = pointer ? await this.readPublished(entity, pointer) : undefined;
      const detection = this.detector.detect(previous, document);

      if (previous && !detection.changed) {
        this.lastSeen.set(entity.id, at.getTime());
        return { written: false, snapshot: previous, changedFields: [] };
      }

      const snapshot: Snapshot = {
        entityId: entity.id,
        level: entity.level,
        timestamp: at,
        content: structuredClone(document),
      };

      try {
        await this.discardUnpublished(entity, pointer);
        await this.backend.writeSnapshot(entity, at, snapshot.content);
        await this.backend.writeLatest(entity, at);
      } catch (err) {
        throw wrapError(err, 'STORAGE_WRITE_FAILURE', `Failed to write snapshot for '${entity.id}'`, {
          entityId: entity.id,
          timestamp: formatSnapshotId(at),
        });
      }

      this.lastSeen.set(entity.id, at.getTime());
      return { written: true, snapshot, changedFields: detection.changedFields };
    });
  }

  /**
   * The snapshot the latest pointer references, or undefined before the
   * first write.
   */
  async latest(entity: Entity): Promise<Snapshot | undefined> {
    // A concurrent write plus prune can retire the body between the two reads;
    // re-reading the pointer resolves that.
    for (let attempt = 0; attempt < 3; attempt++) {
      const pointer = await this.readPointer(entity);
      if (!pointer) return undefined;

      const content = await this.readBody(entity, pointer);
      if (content) {
        return { entityId: entity.id, level: entity.level, timestamp: pointer, content };
      }
    }

    throw new ArchiveError({
      code: 'STORAGE_READ_FAILURE',
      message: `Latest snapshot of '${entity.id}' is missing`,
      context: { entityId: entity.id },
    });
  }

  /**
   * Published snapshot timestamps, oldest first.
   */
  async timestamps(entity: Entity): Promise<Date[]> {
    const pointer = await this.readPointer(entity);
    if (!pointer) return [];
    return this.publishedTimestamps(entity, pointer);
  }

  /**
   * Lazy, oldest-first history. Each iteration starts a fresh listing, so the
   * returned iterable can be consumed any number of times.
   */
  history(entity: Entity): AsyncIterable<Snapshot> {
    return {
      [Symbol.asyncIterator]: () => this.iterateHistory(entity),
    };
  }

  /**
   * Delete published snapshots selected by `shouldDelete`. The snapshot the
   * latest pointer references is never offered to the predicate.
   *
   * Individual delete failures are collected rather than thrown; failing to
   * read the pointer or listing throws.
   */
  async prune(entity: Entity, shouldDelete: (timestamp: Date) => boolean): Promise<PruneResult> {
    return this.lock.run(entity.id, async () => {
      const latest = await this.readPointer(entity);
      if (!latest) return { deleted: [], failures: [] };

      const candidates = (await this.publishedTimestamps(entity, latest)).filter(
        (timestamp) => timestamp.getTime() < latest.getTime() && shouldDelete(timestamp)
      );

      const deleted: Date[] = [];
      const failures: PruneFailure[] = [];
      for (const timestamp of candidates) {
        try {
          await this.backend.deleteSnapshot(entity, timestamp);
          deleted.push(timestamp);
        } catch (err) {
          failures.push({
            timestamp,
            error: wrapError(
              err,
              'STORAGE_DELETE_FAILURE',
              `Failed to delete snapshot '${formatSnapshotId(timestamp)}' of '${entity.id}'`,
              { entityId: entity.id, timestamp: formatSnapshotId(timestamp) }
            ),
          });
        }
      }

      return { latest, deleted, failures };
    });
  }

  private async *iterateHistory(entity: Entity): AsyncGenerator<Snapshot> {
    const timestamps = await this.timestamps(entity);
    for (const timestamp of timestamps) {
      const content = await this.readBody(entity, timestamp);
      // Pruned since the listing was taken
      if (!content) continue;
      yield { entityId: entity.id, level: entity.level, timestamp, content };
    }
  }

  private assertAfterPrevious(entity: Entity, at: Date, pointer: Date | undefined): void {
    const seen = this.lastSeen.get(entity.id);
    const floor = Math.max(pointer?.getTime() ?? -Infinity, seen ?? -Infinity);

    if (at.getTime() <= floor) {
      throw new ArchiveError({
        code: 'OUT_OF_ORDER_TIMESTAMP',
        message: `Timestamp ${formatSnapshotId(at)} for '${entity.id}' is not after ${formatSnapshotId(new Date(floor))}`,
        suggestion: 'Ingest each entity with strictly increasing, minute-distinct timestamps.',
        context: { entityId: entity.id, timestamp: formatSnapshotId(at) },
      });
    }
  }

  /**
   * Bodies newer than the pointer are left over from a write that never
   * published; they are removed before the next write.
   */
  private async discardUnpublished(entity: Entity, pointer: Date | undefined): Promise<void> {
    const all = await this.backend.listTimestamps(entity);
    for (const timestamp of all) {
      if (pointer === undefined || timestamp.getTime() > pointer.getTime()) {
        await this.backend.deleteSnapshot(entity, timestamp);
      }
    }
  }

  private async publishedTimestamps(entity: Entity, pointer: Date): Promise<Date[]> {
    let all: Date[];
    try {
      all = await this.backend.listTimestamps(entity);
    } catch (err) {
      throw wrapError(err, 'STORAGE_READ_FAILURE', `Failed to list snapshots of '${entity.id}'`, {
        entityId: entity.id,
      });
    }
    return all.filter((timestamp) => timestamp.getTime() <= pointer.getTime());
  }

  private async readPublished(entity: Entity, pointer: Date): Promise<Snapshot> {
    const content = await this.readBody(entity, pointer);
    if (!content) {
      throw new ArchiveError({
        code: 'STORAGE_READ_FAILURE',
        message: `Latest pointer of '${entity.id}' references missing snapshot ${formatSnapshotId(pointer)}`,
        context: { entityId: entity.id, timestamp: formatSnapshotId(pointer) },
      });
    }
    return { entityId: entity.id, level: entity.level, timestamp: pointer, content };
  }

  private async readPointer(entity: Entity): Promise<Date | undefined> {
    try {
      return await this.backend.readLatest(entity);
    } catch (err) {
      throw wrapError(err, 'STORAGE_READ_FAILURE', `Failed to read latest pointer of '${entity.id}'`, {
        entityId: entity.id,
      });
    }
  }

  private async readBody(entity: Entity, timestamp: Date): Promise<ElectionDocument | undefined> {
    try {
      return await this.backend.readSnapshot(entity, timestamp);
    } catch (err) {
      throw wrapError(
        err,
        'STORAGE_READ_FAILURE',
        `Failed to read snapshot '${formatSnapshotId(timestamp)}' of '${entity.id}'`,
        { entityId: entity.id }
      );
    }
  }
}
