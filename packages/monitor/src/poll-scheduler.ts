/**
 * Poll Scheduler
 *
 * Decides which levels are due on each tick and feeds every due entity's
 * freshly fetched document into its archive. Levels are polled at different
 * rates: the nation every few minutes, voting districts hourly.
 */

import {
  ENTITY_LEVELS,
  Semaphore,
  silentLogger,
  type Entity,
  type EntityLevel,
  type Logger,
} from '@results-archive/core';
import type { Archive } from '@results-archive/archive';
import type { ResultsApiClient } from './results-client.js';

export type PollIntervals = Record<EntityLevel, number>;

/** Seconds between polls per level */
export const DEFAULT_POLL_INTERVALS: PollIntervals = {
  nation: 300,
  county: 600,
  municipality: 900,
  district: 3600,
};

/** One election year and the archive its documents go to */
export interface PollTarget {
  year: string;
  archive: Archive;
}

export interface PollSchedulerOptions {
  intervals?: PollIntervals;
  /** Entities fetched in parallel (default: 4) */
  concurrency?: number;
  /** Source of snapshot timestamps (default: wall clock) */
  clock?: () => Date;
  logger?: Logger;
}

export interface TickSummary {
  levels: Array<{ year: string; level: EntityLevel }>;
  polled: number;
  written: number;
  failed: number;
}

export class PollScheduler {
  private readonly lastRun = new Map<string, number>();
  private readonly intervals: PollIntervals;
  private readonly semaphore: Semaphore;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly targets: readonly PollTarget[],
    private readonly client: ResultsApiClient,
    options: PollSchedulerOptions = {}
  ) {
    this.intervals = options.intervals ?? DEFAULT_POLL_INTERVALS;
    this.semaphore = new Semaphore(options.concurrency ?? 4);
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Levels of a target whose interval has elapsed at `now`. Levels never
   * polled are always due.
   */
  dueLevels(target: PollTarget, now: Date): EntityLevel[] {
    return ENTITY_LEVELS.filter((level) => {
      const last = this.lastRun.get(`${target.year}:${level}`);
      return last === undefined || now.getTime() - last >= this.intervals[level] * 1000;
    });
  }

  /**
   * Poll every due level. A level counts as run once its turn starts, whatever
   * the outcome for individual entities.
   */
  async tick(now: Date = new Date()): Promise<TickSummary> {
    const summary: TickSummary = { levels: [], polled: 0, written: 0, failed: 0 };

    for (const target of this.targets) {
      for (const level of this.dueLevels(target, now)) {
        this.lastRun.set(`${target.year}:${level}`, now.getTime());
        summary.levels.push({ year: target.year, level });

        const entities = target.archive.registry.byLevel(level);
        const outcomes = await Promise.all(
          entities.map((entity) => this.semaphore.run(() => this.pollEntity(target, entity)))
        );

        for (const outcome of outcomes) {
          summary.polled++;
          if (outcome === 'written') summary.written++;
          if (outcome === 'failed') summary.failed++;
        }
      }
    }

    if (summary.levels.length > 0) {
      this.logger.info('Poll tick finished', {
        levels: summary.levels.map((l) => `${l.year}/${l.level}`),
        polled: summary.polled,
        written: summary.written,
        failed: summary.failed,
      });
    }
    return summary;
  }

  private async pollEntity(
    target: PollTarget,
    entity: Entity
  ): Promise<'written' | 'unchanged' | 'failed'> {
    try {
      const document = await this.client.fetchEntity(target.year, entity);
      // Snapshot identity is the wall-clock time of the fetch
      const result = await target.archive.ingest(entity, document, this.clock());
      return result.written ? 'written' : 'unchanged';
    } catch (err) {
      this.logger.error('Failed to poll entity', {
        year: target.year,
        entityId: entity.id,
        error: err,
      });
      return 'failed';
    }
  }
}
