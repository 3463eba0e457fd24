/**
 * Retention Enforcer
 *
 * Daily sweep that prunes each entity's history according to its level and
 * whether the sweep runs inside the active reporting period. The latest
 * snapshot of every entity survives regardless of age.
 */

import {
  ArchiveError,
  ENTITY_LEVELS,
  Semaphore,
  formatSnapshotId,
  silentLogger,
  wrapError,
  type ArchiveErrorCode,
  type Entity,
  type EntityLevel,
  type Logger,
  type RetentionPeriod,
} from '@results-archive/core';
import type { EntityRegistry } from '../registry/index.js';
import type { SnapshotStore } from '../snapshots/index.js';
import {
  DEFAULT_ACTIVE_MONTHS,
  DEFAULT_RETENTION_POLICY,
  classifyPeriod,
  retentionCutoff,
  validateActiveMonths,
  validateRetentionPolicy,
  type RetentionPolicyTable,
  type RetentionRule,
} from './policy.js';

export interface RetentionOptions {
  policy?: RetentionPolicyTable;
  /** Months (1-12) classified as the active period */
  activeMonths?: readonly number[];
  /** Entities swept in parallel (default: 8) */
  concurrency?: number;
  logger?: Logger;
}

export interface SweepFailure {
  entityId: string;
  level: EntityLevel;
  /** Snapshot that could not be deleted; absent when the entity could not be listed */
  timestamp?: string;
  code: ArchiveErrorCode;
  message: string;
}

export interface SweepResult {
  now: Date;
  period: RetentionPeriod;
  /** Oldest timestamp each level keeps; undefined where the rule is not a window */
  cutoffs: Record<EntityLevel, Date | undefined>;
  deleted: Record<EntityLevel, number>;
  entitiesSwept: number;
  failures: SweepFailure[];
}

interface EntityOutcome {
  deleted: number;
  failures: SweepFailure[];
}

function emptyCounts(): Record<EntityLevel, number> {
  return { nation: 0, county: 0, municipality: 0, district: 0 };
}

export class RetentionEnforcer {
  private readonly policy: RetentionPolicyTable;
  private readonly activeMonths: readonly number[];
  private readonly concurrency: number;
  private readonly logger: Logger;

  /**
   * @throws ArchiveError CONFIG_ERROR for an incomplete policy table
   */
  constructor(
    private readonly registry: EntityRegistry,
    private readonly store: SnapshotStore,
    options: RetentionOptions = {}
  ) {
    this.policy = validateRetentionPolicy(options.policy ?? DEFAULT_RETENTION_POLICY);
    this.activeMonths = validateActiveMonths(options.activeMonths ?? DEFAULT_ACTIVE_MONTHS);
    this.concurrency = options.concurrency ?? 8;
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ArchiveError({
        code: 'CONFIG_ERROR',
        message: `Retention concurrency must be a positive integer (got ${this.concurrency})`,
      });
    }
  }

  classify(now: Date): RetentionPeriod {
    return classifyPeriod(now, this.activeMonths);
  }

  ruleFor(level: EntityLevel, period: RetentionPeriod): RetentionRule {
    return this.policy[level][period];
  }

  async sweep(now: Date): Promise<SweepResult> {
    const period = this.classify(now);
    const cutoffs: Record<EntityLevel, Date | undefined> = {
      nation: retentionCutoff(this.ruleFor('nation', period), now),
      county: retentionCutoff(this.ruleFor('county', period), now),
      municipality: retentionCutoff(this.ruleFor('municipality', period), now),
      district: retentionCutoff(this.ruleFor('district', period), now),
    };
    const semaphore = new Semaphore(this.concurrency);
    const deleted = emptyCounts();
    const failures: SweepFailure[] = [];
    let entitiesSwept = 0;

    this.logger.info('Retention sweep started', { now: now.toISOString(), period });

    await Promise.all(
      ENTITY_LEVELS.flatMap((level) => {
        const rule = this.ruleFor(level, period);
        if (rule.keep === 'all') return [];

        return this.registry.byLevel(level).map((entity) =>
          semaphore.run(async () => {
            const outcome = await this.sweepEntity(entity, rule, now);
            entitiesSwept++;
            deleted[level] += outcome.deleted;
            failures.push(...outcome.failures);
          })
        );
      })
    );

    for (const failure of failures) {
      this.logger.warn('Retention sweep failure', { ...failure });
    }
    this.logger.info('Retention sweep finished', {
      period,
      entitiesSwept,
      deleted,
      failures: failures.length,
    });

    return { now, period, cutoffs, deleted, entitiesSwept, failures };
  }

  private async sweepEntity(entity: Entity, rule: RetentionRule, now: Date): Promise<EntityOutcome> {
    const cutoff = retentionCutoff(rule, now);
    const shouldDelete = (timestamp: Date) =>
      rule.keep === 'latest' || (cutoff !== undefined && timestamp.getTime() < cutoff.getTime());

    try {
      const result = await this.store.prune(entity, shouldDelete);
      if (result.deleted.length > 0) {
        this.logger.debug('Pruned snapshots', {
          entityId: entity.id,
          deleted: result.deleted.length,
        });
      }
      return {
        deleted: result.deleted.length,
        failures: result.failures.map((failure) => ({
          entityId: entity.id,
          level: entity.level,
          timestamp: formatSnapshotId(failure.timestamp),
          code: failure.error.code,
          message: failure.error.message,
        })),
      };
    } catch (err) {
      // Reported under the sweep's own code whatever step failed
      const error = wrapError(err, 'STORAGE_DELETE_FAILURE', `Failed to sweep '${entity.id}'`);
      return {
        deleted: 0,
        failures: [
          { entityId: entity.id, level: entity.level, code: 'STORAGE_DELETE_FAILURE', message: error.message },
        ],
      };
    }
  }
}
