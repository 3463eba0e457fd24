/**
 * Archive Facade
 *
 * Composes registry, change detection, snapshot storage and retention into the
 * two operations the outside world needs: ingest and sweepRetention.
 */

import {
  formatSnapshotId,
  isArchiveError,
  silentLogger,
  type ElectionDocument,
  type Entity,
  type Logger,
  type Snapshot,
  type WriteResult,
} from '@results-archive/core';
import { ChangeDetector, type ChangeDetectionConfig } from './changes/index.js';
import type { EntityRegistry } from './registry/index.js';
import {
  RetentionEnforcer,
  type RetentionOptions,
  type SweepResult,
} from './retention/index.js';
import {
  FileSnapshotBackend,
  MemorySnapshotBackend,
  SnapshotStore,
  type SnapshotBackend,
} from './snapshots/index.js';

export type EntityRef = Entity | string;

export class Archive {
  constructor(
    readonly registry: EntityRegistry,
    readonly store: SnapshotStore,
    readonly retention: RetentionEnforcer,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Record a fetched document for an entity. Writes a snapshot only when the
   * document differs from the latest one.
   */
  async ingest(ref: EntityRef, document: ElectionDocument, timestamp: Date): Promise<WriteResult> {
    const entity = this.resolve(ref);

    try {
      const result = await this.store.writeIfChanged(entity, document, timestamp);
      if (result.written) {
        this.logger.info('Saved new snapshot', {
          entityId: entity.id,
          timestamp: formatSnapshotId(result.snapshot.timestamp),
          changedFields: result.changedFields,
        });
      } else {
        this.logger.debug('No changes', { entityId: entity.id });
      }
      return result;
    } catch (err) {
      if (isArchiveError(err, 'OUT_OF_ORDER_TIMESTAMP') || isArchiveError(err, 'INVALID_DOCUMENT')) {
        this.logger.warn('Rejected ingest', { entityId: entity.id, error: err });
      } else {
        this.logger.error('Ingest failed', { entityId: entity.id, error: err });
      }
      throw err;
    }
  }

  sweepRetention(now: Date): Promise<SweepResult> {
    return this.retention.sweep(now);
  }

  latest(ref: EntityRef): Promise<Snapshot | undefined> {
    return this.store.latest(this.resolve(ref));
  }

  history(ref: EntityRef): AsyncIterable<Snapshot> {
    return this.store.history(this.resolve(ref));
  }

  private resolve(ref: EntityRef): Entity {
    return this.registry.getOrThrow(typeof ref === 'string' ? ref : ref.id);
  }
}

export interface ArchiveOptions {
  registry: EntityRegistry;
  /** Root directory for the file backend */
  dataDir?: string;
  /** Explicit backend; takes precedence over dataDir. Without either, history lives in memory */
  backend?: SnapshotBackend;
  changeDetection?: ChangeDetectionConfig;
  retention?: Omit<RetentionOptions, 'logger'>;
  logger?: Logger;
}

export function createArchive(options: ArchiveOptions): Archive {
  const logger = options.logger ?? silentLogger;
  const backend =
    options.backend ??
    (options.dataDir ? new FileSnapshotBackend(options.dataDir) : new MemorySnapshotBackend());

  const store = new SnapshotStore(backend, new ChangeDetector(options.changeDetection));
  const retention = new RetentionEnforcer(options.registry, store, {
    ...options.retention,
    logger: logger.child({ component: 'retention' }),
  });

  return new Archive(options.registry, store, retention, logger.child({ component: 'archive' }));
}
