/**
 * Monitor
 *
 * Long-running composition of one archive per election year, the poll
 * scheduler and the daily retention trigger, driven by a fixed tick.
 */

import * as path from 'node:path';
import { silentLogger, type Logger } from '@results-archive/core';
import { createArchive } from '@results-archive/archive';
import { entitiesFile, type ConfigFile } from './config.js';
import { EntityScraper, refreshEntityRegistry } from './entity-scraper.js';
import { PollScheduler, type PollTarget, type TickSummary } from './poll-scheduler.js';
import { ResultsApiClient } from './results-client.js';
import { DailyRetentionTrigger, type YearSweep } from './retention-trigger.js';

export interface MonitorTickResult {
  poll: TickSummary;
  sweeps?: YearSweep[];
}

export class Monitor {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<MonitorTickResult | undefined> | null = null;

  constructor(
    readonly targets: readonly PollTarget[],
    private readonly scheduler: PollScheduler,
    readonly retention: DailyRetentionTrigger,
    private readonly tickMs: number,
    private readonly logger: Logger = silentLogger
  ) {}

  async tick(now: Date = new Date()): Promise<MonitorTickResult> {
    const poll = await this.scheduler.tick(now);
    const sweeps = await this.retention.maybeSweep(now);
    return { poll, sweeps };
  }

  start(): void {
    if (this.timer) return;
    this.logger.info('Monitor started', {
      years: this.targets.map((t) => t.year),
      tickMs: this.tickMs,
    });
    this.running = this.safeTick();
    this.timer = setInterval(() => {
      // Skip when the previous tick is still running
      if (this.running) return;
      this.running = this.safeTick();
    }, this.tickMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
    this.logger.info('Monitor stopped');
  }

  private async safeTick(): Promise<MonitorTickResult | undefined> {
    try {
      return await this.tick();
    } catch (err) {
      this.logger.error('Monitor tick failed', { error: err });
      return undefined;
    } finally {
      this.running = null;
    }
  }
}

export interface CreateMonitorOptions {
  logger?: Logger;
  /** Overrides `config.entities.refresh` */
  refreshEntities?: boolean;
  fetch?: typeof fetch;
}

export function createResultsClient(config: ConfigFile, logger: Logger, fetchImpl?: typeof fetch) {
  return new ResultsApiClient({
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.timeoutMs,
    retry: config.api.retry,
    fetch: fetchImpl,
    logger: logger.child({ component: 'results-client' }),
  });
}

/**
 * Build the archives for every configured election year.
 */
export async function createTargets(
  config: ConfigFile,
  client: ResultsApiClient,
  options: CreateMonitorOptions = {}
): Promise<PollTarget[]> {
  const logger = options.logger ?? silentLogger;
  const scraper = new EntityScraper(client, logger.child({ component: 'entity-scraper' }));
  const targets: PollTarget[] = [];

  for (const year of config.electionYears) {
    const registry = await refreshEntityRegistry({
      scraper,
      year,
      filePath: entitiesFile(config, year),
      refresh: options.refreshEntities ?? config.entities.refresh,
      logger,
    });

    const archive = createArchive({
      registry,
      dataDir: path.join(config.dataDir, year),
      changeDetection: config.changeDetection,
      retention: {
        policy: config.retention.policy,
        activeMonths: config.retention.activeMonths,
        concurrency: config.retention.concurrency,
      },
      logger: logger.child({ year }),
    });
    logger.info('Archive ready', { year, entities: registry.size });
    targets.push({ year, archive });
  }

  return targets;
}

export async function createMonitor(
  config: ConfigFile,
  options: CreateMonitorOptions = {}
): Promise<Monitor> {
  const logger = options.logger ?? silentLogger;
  const client = createResultsClient(config, logger, options.fetch);
  const targets = await createTargets(config, client, options);

  const scheduler = new PollScheduler(targets, client, {
    intervals: config.poll.intervals,
    concurrency: config.poll.concurrency,
    logger: logger.child({ component: 'poll' }),
  });
  const trigger = new DailyRetentionTrigger(
    targets,
    config.retention.sweepHourUtc,
    logger.child({ component: 'retention-trigger' })
  );

  return new Monitor(targets, scheduler, trigger, config.poll.tickSeconds * 1000, logger);
}
