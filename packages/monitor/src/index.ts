/**
 * @results-archive/monitor
 *
 * Polls the results API and feeds the archive; triggers the daily retention sweep
 */

export {
  configFileSchema,
  entitiesFile,
  expandEnvVars,
  loadConfig,
  parseConfig,
  ENV_CONFIG,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';
export {
  EntityScraper,
  emptyDefinition,
  mergeDefinitions,
  refreshEntityRegistry,
  relatedLinks,
} from './entity-scraper.js';
export type { RefreshOptions } from './entity-scraper.js';
export { Monitor, createMonitor, createResultsClient, createTargets } from './monitor.js';
export type { CreateMonitorOptions, MonitorTickResult } from './monitor.js';
export { DEFAULT_POLL_INTERVALS, PollScheduler } from './poll-scheduler.js';
export type { PollIntervals, PollSchedulerOptions, PollTarget, TickSummary } from './poll-scheduler.js';
export { HttpStatusError, ResultsApiClient, isRetryableFetchError } from './results-client.js';
export type { ResultsClientConfig } from './results-client.js';
export { DailyRetentionTrigger } from './retention-trigger.js';
export type { YearSweep } from './retention-trigger.js';
export { computeBackoffDelayMs, sleep, withRetries } from './retry.js';
export type { RetryConfig, RetryContext, RetryHooks } from './retry.js';
