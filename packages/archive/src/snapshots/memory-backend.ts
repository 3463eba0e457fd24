/**
 * In-memory snapshot backend for embedding and tests. Bodies are kept as
 * serialized JSON so callers can never mutate stored content.
 */

import type { ElectionDocument, Entity } from '@results-archive/core';
import type { SnapshotBackend } from './backend.js';

interface EntityRecord {
  latest?: number;
  bodies: Map<number, string>;
}

export class MemorySnapshotBackend implements SnapshotBackend {
  private readonly entities = new Map<string, EntityRecord>();

  private record(entity: Entity): EntityRecord {
    let record = this.entities.get(entity.id);
    if (!record) {
      record = { bodies: new Map() };
      this.entities.set(entity.id, record);
    }
    return record;
  }

  async readLatest(entity: Entity): Promise<Date | undefined> {
    const latest = this.entities.get(entity.id)?.latest;
    return latest === undefined ? undefined : new Date(latest);
  }

  async writeLatest(entity: Entity, timestamp: Date): Promise<void> {
    this.record(entity).latest = timestamp.getTime();
  }

  async readSnapshot(entity: Entity, timestamp: Date): Promise<ElectionDocument | undefined> {
    const body = this.entities.get(entity.id)?.bodies.get(timestamp.getTime());
    if (body === undefined) return undefined;
    const parsed: ElectionDocument = JSON.parse(body);
    return parsed;
  }

  async writeSnapshot(entity: Entity, timestamp: Date, content: ElectionDocument): Promise<void> {
    this.record(entity).bodies.set(timestamp.getTime(), JSON.stringify(content));
  }

  async listTimestamps(entity: Entity): Promise<Date[]> {
    const bodies = this.entities.get(entity.id)?.bodies;
    if (!bodies) return [];
    return Array.from(bodies.keys())
      .sort((a, b) => a - b)
      .map((ms) => new Date(ms));
  }

  async deleteSnapshot(entity: Entity, timestamp: Date): Promise<void> {
    this.entities.get(entity.id)?.bodies.delete(timestamp.getTime());
  }
}
