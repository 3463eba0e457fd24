import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ArchiveError, formatZodIssues } from '@results-archive/core';
import {
  activeMonthsSchema,
  changeDetectionConfigSchema,
  retentionPolicySchema,
} from '@results-archive/archive';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: `Missing required environment variable: ${name}`,
    });
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON value.
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const yearSchema = z
  .union([z.string(), z.number().int()])
  .transform((value) => String(value).trim())
  .pipe(z.string().regex(/^\d{4}$/, 'Election years are four-digit numbers'));

/** Accepts an array or a comma-separated string such as "2021,2025" */
const electionYearsSchema = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : value,
  z.array(yearSchema).min(1)
);

const retrySchema = z
  .object({
    attempts: z.number().int().min(1).max(10).default(5),
    baseDelayMs: z.number().int().min(0).max(60_000).default(1000),
    maxDelayMs: z.number().int().min(0).max(300_000).default(30_000),
    jitter: z.number().min(0).max(1).default(0.2),
  })
  .strict();

const intervalSeconds = z.number().int().min(1);

export const pollSchema = z
  .object({
    /** Seconds between polls of each level */
    intervals: z
      .object({
        nation: intervalSeconds.default(300),
        county: intervalSeconds.default(600),
        municipality: intervalSeconds.default(900),
        district: intervalSeconds.default(3600),
      })
      .strict()
      .default({}),
    /** How often due levels are checked */
    tickSeconds: intervalSeconds.default(60),
    concurrency: z.number().int().min(1).max(64).default(4),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    api: z
      .object({
        baseUrl: z.string().url().default('https://valgresultat.no/api'),
        timeoutMs: z.number().int().min(1).max(300_000).default(30_000),
        retry: retrySchema.default({}),
      })
      .strict()
      .default({}),
    dataDir: z.string().min(1).default('./data'),
    electionYears: electionYearsSchema,
    entities: z
      .object({
        /** Directory holding entities-{year}.json (default: {dataDir}/config) */
        dir: z.string().min(1).optional(),
        /** Re-scrape the hierarchy from the API at startup */
        refresh: z.boolean().default(true),
      })
      .strict()
      .default({}),
    poll: pollSchema.default({}),
    changeDetection: changeDetectionConfigSchema.optional(),
    retention: z
      .object({
        policy: retentionPolicySchema.optional(),
        activeMonths: activeMonthsSchema.optional(),
        concurrency: z.number().int().min(1).max(64).optional(),
        /** UTC hour after which the daily sweep runs */
        sweepHourUtc: z.number().int().min(0).max(23).default(3),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const years = new Set<string>();
    value.electionYears.forEach((year, index) => {
      if (years.has(year)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate election year: ${year}`,
          path: ['electionYears', index],
        });
      }
      years.add(year);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Used when no config file is given; mirrors the environment variables the
 * container image sets.
 */
export const ENV_CONFIG = {
  api: { baseUrl: '${API_BASE_URL:-https://valgresultat.no/api}' },
  dataDir: '${DATA_PATH:-./data}',
  electionYears: '${ELECTION_YEARS:-2021,2025,2029}',
};

/**
 * Validate a raw (already JSON-decoded) config value.
 *
 * @throws ArchiveError CONFIG_ERROR listing every invalid path
 */
export function parseConfig(raw: unknown): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw));
  if (!result.success) {
    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: formatZodIssues('Invalid config', result.error),
    });
  }
  return result.data;
}

export async function loadConfig(configPath?: string): Promise<ConfigFile> {
  if (!configPath) {
    return parseConfig(ENV_CONFIG);
  }

  const absolutePath = path.resolve(process.cwd(), configPath);
  let parsed: unknown;
  try {
    const content = await readFile(absolutePath, 'utf-8');
    // Handle UTF-8 BOM to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: `Failed to read config '${absolutePath}'`,
      cause: err instanceof Error ? err : undefined,
    });
  }
  return parseConfig(parsed);
}

export function entitiesFile(config: ConfigFile, year: string): string {
  const dir = config.entities.dir ?? path.join(config.dataDir, 'config');
  return path.join(dir, `entities-${year}.json`);
}
