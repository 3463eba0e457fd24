/**
 * File-system snapshot backend
 *
 * Layout:
 *   {rootDir}/{level}/{entityId}/{YYYY-MM-DD__HHMM}.json   snapshot bodies
 *   {rootDir}/{level}/{entityId}/latest.json               latest pointer
 *
 * Every file is written to a temporary name, fsynced and renamed into place.
 */

import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import {
  ArchiveError,
  formatSnapshotId,
  parseSnapshotId,
  type ElectionDocument,
  type Entity,
} from '@results-archive/core';
import type { SnapshotBackend } from './backend.js';

const LATEST_FILE = 'latest.json';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, 'w', 0o644);
  try {
    try {
      await handle.writeFile(data, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

export class FileSnapshotBackend implements SnapshotBackend {
  constructor(private readonly rootDir: string) {}

  get root(): string {
    return this.rootDir;
  }

  entityDir(entity: Entity): string {
    // Sanitize to prevent directory traversal
    const sanitized = entity.id.replace(/[^a-zA-Z0-9_-]/g, '_');
    return path.join(this.rootDir, entity.level, sanitized);
  }

  private snapshotPath(entity: Entity, timestamp: Date): string {
    return path.join(this.entityDir(entity), `${formatSnapshotId(timestamp)}.json`);
  }

  async readLatest(entity: Entity): Promise<Date | undefined> {
    const filePath = path.join(this.entityDir(entity), LATEST_FILE);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }

    const parsed: unknown = JSON.parse(content);
    const id = isRecord(parsed) ? parsed['timestamp'] : undefined;
    const timestamp = typeof id === 'string' ? parseSnapshotId(id) : undefined;
    if (!timestamp) {
      throw new ArchiveError({
        code: 'STORAGE_READ_FAILURE',
        message: `Latest pointer for '${entity.id}' is malformed`,
        context: { entityId: entity.id, filePath },
      });
    }
    return timestamp;
  }

  async writeLatest(entity: Entity, timestamp: Date): Promise<void> {
    const dir = this.entityDir(entity);
    await fs.mkdir(dir, { recursive: true });
    await writeFileAtomic(
      path.join(dir, LATEST_FILE),
      `${JSON.stringify({ timestamp: formatSnapshotId(timestamp) })}\n`
    );
  }

  async readSnapshot(entity: Entity, timestamp: Date): Promise<ElectionDocument | undefined> {
    const filePath = this.snapshotPath(entity, timestamp);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new ArchiveError({
        code: 'STORAGE_READ_FAILURE',
        message: `Snapshot '${formatSnapshotId(timestamp)}' of '${entity.id}' is not a JSON object`,
        context: { entityId: entity.id, filePath },
      });
    }
    return parsed;
  }

  async writeSnapshot(entity: Entity, timestamp: Date, content: ElectionDocument): Promise<void> {
    await fs.mkdir(this.entityDir(entity), { recursive: true });
    await writeFileAtomic(
      this.snapshotPath(entity, timestamp),
      `${JSON.stringify(content, null, 2)}\n`
    );
  }

  async listTimestamps(entity: Entity): Promise<Date[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.entityDir(entity));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const timestamps: Date[] = [];
    for (const file of files) {
      if (!file.endsWith('.json') || file === LATEST_FILE) continue;
      const timestamp = parseSnapshotId(file.slice(0, -'.json'.length));
      if (timestamp) timestamps.push(timestamp);
    }

    return timestamps.sort((a, b) => a.getTime() - b.getTime());
  }

  async deleteSnapshot(entity: Entity, timestamp: Date): Promise<void> {
    await fs.rm(this.snapshotPath(entity, timestamp), { force: true });
  }
}
