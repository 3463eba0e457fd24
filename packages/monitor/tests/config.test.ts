import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { entitiesFile, expandEnvVars, loadConfig, parseConfig } from '../src/config.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('parseConfig', () => {
  it('fills defaults around the election years', () => {
    const config = parseConfig({ electionYears: '2021, 2025' });

    expect(config.electionYears).toEqual(['2021', '2025']);
    expect(config.dataDir).toBe('./data');
    expect(config.api).toEqual({
      baseUrl: 'https://valgresultat.no/api',
      timeoutMs: 30_000,
      retry: { attempts: 5, baseDelayMs: 1000, maxDelayMs: 30_000, jitter: 0.2 },
    });
    expect(config.poll).toEqual({
      intervals: { nation: 300, county: 600, municipality: 900, district: 3600 },
      tickSeconds: 60,
      concurrency: 4,
    });
    expect(config.entities.refresh).toBe(true);
    expect(config.retention.sweepHourUtc).toBe(3);
  });

  it('accepts numeric years', () => {
    expect(parseConfig({ electionYears: [2025] }).electionYears).toEqual(['2025']);
  });

  it('rejects malformed and duplicate years', () => {
    expect(() => parseConfig({ electionYears: ['25'] })).toThrow('Election years are four-digit numbers');
    expect(() => parseConfig({ electionYears: '2025,2025' })).toThrow(
      'electionYears.1: Duplicate election year: 2025'
    );
  });

  it('rejects unknown keys and invalid retention settings', () => {
    expect(() => parseConfig({ electionYears: [2025], dataDirectory: '/x' })).toThrow(
      "Unrecognized key(s) in object: 'dataDirectory'"
    );
    expect(() => parseConfig({ electionYears: [2025], retention: { activeMonths: [13] } })).toThrow(
      'retention.activeMonths.0'
    );
  });

  it('resolves the entity definition path per year', () => {
    const config = parseConfig({ electionYears: [2025], dataDir: '/srv/results' });
    expect(entitiesFile(config, '2025')).toBe('/srv/results/config/entities-2025.json');

    const custom = parseConfig({ electionYears: [2025], entities: { dir: '/etc/results' } });
    expect(entitiesFile(custom, '2025')).toBe('/etc/results/entities-2025.json');
  });
});

describe('expandEnvVars', () => {
  it('substitutes variables and defaults inside nested values', () => {
    vi.stubEnv('RESULTS_TEST_DIR', '/srv/data');

    expect(
      expandEnvVars({
        dataDir: '${RESULTS_TEST_DIR}',
        years: ['${RESULTS_TEST_UNSET:-2025}'],
        timeoutMs: 10,
      })
    ).toEqual({ dataDir: '/srv/data', years: ['2025'], timeoutMs: 10 });
  });

  it('fails on missing variables unless allowed', () => {
    expect(() => expandEnvVars('${RESULTS_TEST_UNSET}')).toThrow(
      'Missing required environment variable: RESULTS_TEST_UNSET'
    );
    expect(expandEnvVars('${RESULTS_TEST_UNSET}', { allowMissing: true })).toBe('${RESULTS_TEST_UNSET}');
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads the environment when no file is given', async () => {
    vi.stubEnv('API_BASE_URL', 'https://results.test/api');
    vi.stubEnv('DATA_PATH', '/srv/results');
    vi.stubEnv('ELECTION_YEARS', '2023,2025');

    const config = await loadConfig();

    expect(config.api.baseUrl).toBe('https://results.test/api');
    expect(config.dataDir).toBe('/srv/results');
    expect(config.electionYears).toEqual(['2023', '2025']);
  });

  it('reads a JSON file with a byte order mark', async () => {
    dir = mkdtempSync(join(tmpdir(), 'results-archive-config-'));
    const file = join(dir, 'config.json');
    writeFileSync(
      file,
      `\uFEFF${JSON.stringify({ electionYears: [2025], poll: { concurrency: 2 } })}`,
      'utf-8'
    );

    const config = await loadConfig(file);
    expect(config.poll.concurrency).toBe(2);
    expect(config.poll.intervals.nation).toBe(300);
  });

  it('accepts the example config shipped with the repository', async () => {
    vi.stubEnv('API_BASE_URL', '');
    vi.stubEnv('DATA_PATH', '');
    vi.stubEnv('ELECTION_YEARS', '');

    const config = await loadConfig(fileURLToPath(new URL('../../../config.example.json', import.meta.url)));

    expect(config.electionYears).toEqual(['2021', '2025', '2029']);
    expect(config.dataDir).toBe('./data');
    expect(config.retention.activeMonths).toEqual([9, 10]);
  });

  it('reports unreadable files as configuration errors', async () => {
    dir = mkdtempSync(join(tmpdir(), 'results-archive-config-'));
    await expect(loadConfig(join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'CONFIG_ERROR' });
  });
});
