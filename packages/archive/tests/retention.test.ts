import { beforeEach, describe, expect, it } from 'vitest';
import type { Entity, WriteResult } from '@results-archive/core';
import type { EntityRegistry } from '../src/registry/index.js';
import {
  DEFAULT_RETENTION_POLICY,
  RetentionEnforcer,
  classifyPeriod,
  retentionCutoff,
  validateActiveMonths,
  validateRetentionPolicy,
  type SweepResult,
} from '../src/retention/index.js';
import { MemorySnapshotBackend, SnapshotStore } from '../src/snapshots/index.js';
import { at, buildRegistry, isoList, resultDocument } from './fixtures.js';

class FlakyBackend extends MemorySnapshotBackend {
  readonly failDeletesFor = new Set<string>();
  readonly failListingFor = new Set<string>();

  override async deleteSnapshot(entity: Entity, timestamp: Date): Promise<void> {
    if (this.failDeletesFor.has(entity.id)) throw new Error('read-only file system');
    return super.deleteSnapshot(entity, timestamp);
  }

  override async listTimestamps(entity: Entity): Promise<Date[]> {
    if (this.failListingFor.has(entity.id)) throw new Error('permission denied');
    return super.listTimestamps(entity);
  }
}

describe('retention policy', () => {
  it('classifies September and October as active', () => {
    expect(classifyPeriod(at('2025-09-01T00:00:00Z'))).toBe('active');
    expect(classifyPeriod(at('2025-10-31T23:59:00Z'))).toBe('active');
    expect(classifyPeriod(at('2025-08-31T23:59:00Z'))).toBe('quiet');
    expect(classifyPeriod(at('2025-11-01T00:00:00Z'))).toBe('quiet');
    expect(classifyPeriod(at('2025-06-15T00:00:00Z'), [6])).toBe('active');
  });

  it('computes window cutoffs in days', () => {
    const now = at('2025-09-15T12:00:00Z');
    expect(retentionCutoff({ keep: 'window', days: 180 }, now)?.toISOString()).toBe(
      '2025-03-19T12:00:00.000Z'
    );
    expect(retentionCutoff({ keep: 'latest' }, now)).toBeUndefined();
  });

  it('requires a rule for every level and period', () => {
    const { district: _omitted, ...incomplete } = DEFAULT_RETENTION_POLICY;
    expect(() => validateRetentionPolicy(incomplete)).toThrow(
      'Invalid retention policy'
    );
    expect(() =>
      validateRetentionPolicy({
        ...DEFAULT_RETENTION_POLICY,
        county: { active: { keep: 'window', days: 0 }, quiet: { keep: 'latest' } },
      })
    ).toThrow('Invalid retention policy');
    expect(() => validateActiveMonths([13])).toThrow('Invalid active months');
  });
});

describe('RetentionEnforcer', () => {
  let registry: EntityRegistry;
  let backend: FlakyBackend;
  let store: SnapshotStore;

  async function seed(entityId: string, timestamps: string[]): Promise<void> {
    const entity = registry.getOrThrow(entityId);
    let votes = 0;
    for (const timestamp of timestamps) {
      votes++;
      await store.writeIfChanged(entity, resultDocument({ ap: votes, h: 0 }), at(timestamp));
    }
  }

  async function remaining(entityId: string): Promise<string[]> {
    return isoList(await store.timestamps(registry.getOrThrow(entityId)));
  }

  beforeEach(() => {
    registry = buildRegistry();
    backend = new FlakyBackend();
    store = new SnapshotStore(backend);
  });

  it('keeps the level window plus the latest snapshot in the active period', async () => {
    await seed('county-01', [
      '2024-12-01T00:00:00Z',
      '2025-03-01T00:00:00Z',
      '2025-03-20T00:00:00Z',
      '2025-06-01T00:00:00Z',
      '2025-09-10T00:00:00Z',
    ]);
    await seed('municipality-01-3001', ['2024-01-01T00:00:00Z', '2024-02-01T00:00:00Z']);

    const enforcer = new RetentionEnforcer(registry, store);
    const result = await enforcer.sweep(at('2025-09-15T12:00:00Z'));

    expect(result.period).toBe('active');
    expect(result.cutoffs.nation?.toISOString()).toBe('2024-09-15T12:00:00.000Z');
    expect(result.cutoffs.county?.toISOString()).toBe('2025-03-19T12:00:00.000Z');
    expect(result.deleted).toEqual({ nation: 0, county: 2, municipality: 1, district: 0 });
    expect(result.entitiesSwept).toBe(7);
    expect(result.failures).toEqual([]);
    expect(await remaining('county-01')).toEqual([
      '2025-03-20T00:00:00.000Z',
      '2025-06-01T00:00:00.000Z',
      '2025-09-10T00:00:00.000Z',
    ]);
    expect(await remaining('municipality-01-3001')).toEqual(['2024-02-01T00:00:00.000Z']);
  });

  it('keeps only the latest below the nation in the quiet period', async () => {
    const history = ['2025-09-08T18:00:00Z', '2025-09-08T19:00:00Z', '2025-09-08T20:00:00Z'];
    await seed('nation', history);
    await seed('municipality-01-3001', history);
    await seed('district-01-3001-0002', history);

    const enforcer = new RetentionEnforcer(registry, store);
    const result = await enforcer.sweep(at('2025-12-01T03:00:00Z'));

    expect(result.period).toBe('quiet');
    expect(result.deleted).toEqual({ nation: 0, county: 0, municipality: 2, district: 2 });
    expect(result.entitiesSwept).toBe(6);
    expect(await remaining('nation')).toHaveLength(3);
    expect(await remaining('municipality-01-3001')).toEqual(['2025-09-08T20:00:00.000Z']);
    expect(await remaining('district-01-3001-0002')).toEqual(['2025-09-08T20:00:00.000Z']);
  });

  it('is idempotent', async () => {
    await seed('county-03', ['2025-01-01T00:00:00Z', '2025-02-01T00:00:00Z']);
    const enforcer = new RetentionEnforcer(registry, store);

    const first = await enforcer.sweep(at('2025-12-01T03:00:00Z'));
    const second = await enforcer.sweep(at('2025-12-01T03:00:00Z'));

    expect(first.deleted.county).toBe(1);
    expect(second.deleted).toEqual({ nation: 0, county: 0, municipality: 0, district: 0 });
    expect(await remaining('county-03')).toEqual(['2025-02-01T00:00:00.000Z']);
  });

  it('isolates failures to the affected entity', async () => {
    const history = ['2025-01-01T00:00:00Z', '2025-02-01T00:00:00Z'];
    await seed('county-01', history);
    await seed('county-03', history);
    await seed('municipality-03-0301', history);
    backend.failDeletesFor.add('county-01');
    backend.failListingFor.add('municipality-03-0301');

    const enforcer = new RetentionEnforcer(registry, store, { concurrency: 2 });
    const result = await enforcer.sweep(at('2025-12-01T03:00:00Z'));

    expect(result.deleted.county).toBe(1);
    expect(await remaining('county-03')).toEqual(['2025-02-01T00:00:00.000Z']);
    expect(result.failures).toHaveLength(2);
    expect(result.failures).toContainEqual({
      entityId: 'county-01',
      level: 'county',
      timestamp: '2025-01-01__0000',
      code: 'STORAGE_DELETE_FAILURE',
      message: "Failed to delete snapshot '2025-01-01__0000' of 'county-01': read-only file system",
    });
    expect(result.failures).toContainEqual({
      entityId: 'municipality-03-0301',
      level: 'municipality',
      code: 'STORAGE_DELETE_FAILURE',
      message: "Failed to list snapshots of 'municipality-03-0301': permission denied",
    });
  });

  it('runs alongside writes to the same entity without losing the latest', async () => {
    const entity = registry.getOrThrow('district-01-3001-0001');
    const enforcer = new RetentionEnforcer(registry, store, { concurrency: 2 });
    const sweepAt = at('2025-12-01T12:00:00Z');

    const writes: Promise<WriteResult>[] = [];
    const sweeps: Promise<SweepResult>[] = [];
    for (let minute = 1; minute <= 30; minute++) {
      writes.push(
        store.writeIfChanged(entity, resultDocument({ ap: minute, h: 0 }), new Date(Date.UTC(2025, 11, 1, 0, minute)))
      );
      if (minute % 5 === 0) sweeps.push(enforcer.sweep(sweepAt));
    }
    const [written, swept] = await Promise.all([Promise.all(writes), Promise.all(sweeps)]);
    const final = await enforcer.sweep(sweepAt);

    expect(written.every((result) => result.written)).toBe(true);
    const latest = await store.latest(entity);
    expect(latest?.timestamp.toISOString()).toBe('2025-12-01T00:30:00.000Z');
    expect(latest?.content['stemmer']).toEqual({ total: 30 });
    expect(await remaining('district-01-3001-0001')).toEqual(['2025-12-01T00:30:00.000Z']);

    const results = [...swept, final];
    expect(results.flatMap((result) => result.failures)).toEqual([]);
    expect(results.reduce((sum, result) => sum + result.deleted.district, 0)).toBe(29);
  });

  it('rejects an invalid configuration at construction', () => {
    expect(() => new RetentionEnforcer(registry, store, { concurrency: 0 })).toThrow(
      'Retention concurrency must be a positive integer (got 0)'
    );
    expect(() => new RetentionEnforcer(registry, store, { activeMonths: [0] })).toThrow(
      'Invalid active months'
    );
  });
});
