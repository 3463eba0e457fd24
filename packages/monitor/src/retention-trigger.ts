/**
 * Fires the retention sweep of every archive once per UTC day, at or after a
 * configured hour.
 */

import { silentLogger, type Logger } from '@results-archive/core';
import type { SweepResult } from '@results-archive/archive';
import type { PollTarget } from './poll-scheduler.js';

export interface YearSweep {
  year: string;
  result: SweepResult;
}

export class DailyRetentionTrigger {
  private lastSweepDay?: string;

  constructor(
    private readonly targets: readonly PollTarget[],
    private readonly hourUtc: number = 3,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Sweep if today's sweep is due. Returns undefined when nothing ran.
   */
  async maybeSweep(now: Date): Promise<YearSweep[] | undefined> {
    const day = now.toISOString().slice(0, 10);
    if (day === this.lastSweepDay || now.getUTCHours() < this.hourUtc) {
      return undefined;
    }
    this.lastSweepDay = day;
    return this.sweepAll(now);
  }

  async sweepAll(now: Date): Promise<YearSweep[]> {
    const results: YearSweep[] = [];
    for (const target of this.targets) {
      try {
        const result = await target.archive.sweepRetention(now);
        if (result.failures.length > 0) {
          this.logger.warn('Retention sweep finished with failures', {
            year: target.year,
            failures: result.failures.length,
          });
        }
        results.push({ year: target.year, result });
      } catch (err) {
        this.logger.error('Retention sweep failed', { year: target.year, error: err });
      }
    }
    return results;
  }
}
