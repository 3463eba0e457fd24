#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   results-archive run    [--config ./config.json]   poll and archive continuously
 *   results-archive sweep  [--config ./config.json]   run the retention sweep once
 *   results-archive scrape [--config ./config.json]   refresh entity definitions
 */

import { Logger } from '@results-archive/core';
import { loadConfig } from './config.js';
import { createMonitor, createResultsClient, createTargets } from './monitor.js';
import { DailyRetentionTrigger } from './retention-trigger.js';

const COMMANDS = ['run', 'sweep', 'scrape'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function usage(): void {
  console.error('Usage: results-archive <run|sweep|scrape> [--config <config.json>]');
  console.error('');
  console.error('Without --config, API_BASE_URL, DATA_PATH and ELECTION_YEARS are read from the environment.');
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const command = args[0];
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;

  if (!isCommand(command) || (configIndex !== -1 && !configPath)) {
    usage();
    process.exit(1);
  }

  try {
    const config = await loadConfig(configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });
    logger.info('Configuration loaded', {
      command,
      apiBaseUrl: config.api.baseUrl,
      dataDir: config.dataDir,
      electionYears: config.electionYears,
    });

    switch (command) {
      case 'run': {
        const monitor = await createMonitor(config, { logger });
        const shutdown = (signal: string) => {
          logger.info('Shutting down', { signal });
          monitor.stop().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error('Shutdown failed', { error: err });
              process.exit(1);
            }
          );
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
        monitor.start();
        break;
      }

      case 'sweep': {
        const client = createResultsClient(config, logger);
        const targets = await createTargets(config, client, { logger, refreshEntities: false });
        const trigger = new DailyRetentionTrigger(targets, 0, logger);
        const sweeps = await trigger.sweepAll(new Date());
        process.stdout.write(`${JSON.stringify(sweeps, null, 2)}\n`);
        break;
      }

      case 'scrape': {
        const client = createResultsClient(config, logger);
        const targets = await createTargets(config, client, { logger, refreshEntities: true });
        for (const target of targets) {
          process.stdout.write(`${target.year}: ${target.archive.registry.size} entities\n`);
        }
        break;
      }
    }
  } catch (error) {
    logger.error('Command failed', { command, error });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
