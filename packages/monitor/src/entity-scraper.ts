/**
 * Entity Scraper
 *
 * Walks `_links.related` from the national results document down to voting
 * districts and produces an entity definition for the registry.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import {
  ArchiveError,
  entityDefinitionSchema,
  formatZodIssues,
  silentLogger,
  type EntityDefinition,
  type Logger,
} from '@results-archive/core';
import { EntityRegistry } from '@results-archive/archive';
import type { ResultsApiClient } from './results-client.js';

/** One entry of `_links.related` */
interface RelatedLink {
  code: string;
  name?: string;
  href?: string;
  hasChildren: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nameFromLink(link: Record<string, unknown>): string | undefined {
  const navn = link['navn'];
  if (typeof navn === 'string' && navn.trim()) return navn.trim();

  const hrefNavn = link['hrefNavn'];
  if (typeof hrefNavn !== 'string') return undefined;
  const last = hrefNavn.split('/').pop();
  if (!last) return undefined;
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

/**
 * Extract related links from a results document. Entries without a number
 * are skipped.
 */
export function relatedLinks(document: unknown): RelatedLink[] {
  if (!isRecord(document)) return [];
  const links = document['_links'];
  if (!isRecord(links)) return [];
  const related = links['related'];
  if (!Array.isArray(related)) return [];

  const out: RelatedLink[] = [];
  for (const entry of related) {
    if (!isRecord(entry)) continue;
    const nr = entry['nr'];
    if (typeof nr !== 'string' && typeof nr !== 'number') continue;
    const href = entry['href'];
    out.push({
      code: String(nr),
      name: nameFromLink(entry),
      href: typeof href === 'string' ? href : undefined,
      hasChildren: entry['harUnderordnet'] === true,
    });
  }
  return out;
}

export function emptyDefinition(): EntityDefinition {
  return { counties: [], municipalities: [], districts: [] };
}

/**
 * Union of two definitions. Entries already in `existing` win; new ones are
 * appended in `scraped` order.
 */
export function mergeDefinitions(
  existing: EntityDefinition,
  scraped: EntityDefinition
): EntityDefinition {
  const merged: EntityDefinition = {
    counties: [...existing.counties],
    municipalities: [...existing.municipalities],
    districts: [...existing.districts],
  };

  const counties = new Set(merged.counties.map((c) => c.code));
  for (const county of scraped.counties) {
    if (counties.has(county.code)) continue;
    counties.add(county.code);
    merged.counties.push(county);
  }

  const municipalities = new Set(merged.municipalities.map((m) => m.code));
  for (const municipality of scraped.municipalities) {
    if (municipalities.has(municipality.code)) continue;
    municipalities.add(municipality.code);
    merged.municipalities.push(municipality);
  }

  const districtKey = (d: { municipality: string; code: string }) => `${d.municipality}/${d.code}`;
  const districts = new Set(merged.districts.map(districtKey));
  for (const district of scraped.districts) {
    if (districts.has(districtKey(district))) continue;
    districts.add(districtKey(district));
    merged.districts.push(district);
  }

  return merged;
}

export class EntityScraper {
  constructor(
    private readonly client: ResultsApiClient,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Scrape the hierarchy for one election year. A failing county or
   * municipality is logged and skipped; a failing national document throws.
   */
  async scrape(year: string): Promise<EntityDefinition> {
    const definition = emptyDefinition();
    const national = await this.client.fetchPath(`/${encodeURIComponent(year)}/st`);

    for (const county of relatedLinks(national)) {
      definition.counties.push({ code: county.code, name: county.name });
      if (!county.href) continue;

      const countyDoc = await this.tryFetch(county.href);
      if (!countyDoc) continue;

      for (const municipality of relatedLinks(countyDoc)) {
        definition.municipalities.push({
          code: municipality.code,
          county: county.code,
          name: municipality.name,
        });
        if (!municipality.hasChildren || !municipality.href) continue;

        const municipalityDoc = await this.tryFetch(municipality.href);
        if (!municipalityDoc) continue;

        for (const district of relatedLinks(municipalityDoc)) {
          definition.districts.push({
            code: district.code,
            county: county.code,
            municipality: municipality.code,
            name: district.name,
          });
        }
      }
    }

    this.logger.info('Scraped entities', {
      year,
      counties: definition.counties.length,
      municipalities: definition.municipalities.length,
      districts: definition.districts.length,
    });
    return definition;
  }

  private async tryFetch(href: string): Promise<unknown> {
    try {
      return await this.client.fetchPath(href);
    } catch (err) {
      this.logger.warn('Skipping entity subtree', { href, error: err });
      return undefined;
    }
  }
}

async function readDefinition(filePath: string, logger: Logger): Promise<EntityDefinition | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    logger.error('Unreadable entity definition on disk', { filePath, error: err });
    return undefined;
  }

  const parsed = entityDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error('Invalid entity definition on disk', {
      filePath,
      issues: formatZodIssues('Invalid entity definition', parsed.error),
    });
    return undefined;
  }
  return parsed.data;
}

export interface RefreshOptions {
  scraper: EntityScraper;
  year: string;
  filePath: string;
  /** Scrape the API; when false only the file is read */
  refresh: boolean;
  logger?: Logger;
}

/**
 * Load the registry for one year, refreshing the on-disk definition from the
 * API first. New entities are added; known ones are never removed. When
 * scraping fails the saved definition is used.
 *
 * @throws ArchiveError CONFIG_ERROR when neither source yields a definition
 */
export async function refreshEntityRegistry(options: RefreshOptions): Promise<EntityRegistry> {
  const logger = options.logger ?? silentLogger;
  const existing = await readDefinition(options.filePath, logger);

  if (options.refresh) {
    try {
      const scraped = await options.scraper.scrape(options.year);
      const merged = mergeDefinitions(existing ?? emptyDefinition(), scraped);
      const registry = EntityRegistry.fromDefinition(merged);

      await fs.mkdir(path.dirname(options.filePath), { recursive: true });
      await fs.writeFile(options.filePath, `${JSON.stringify(merged, null, 2)}\n`, 'utf-8');
      logger.info('Updated entity definition', { year: options.year, filePath: options.filePath });
      return registry;
    } catch (err) {
      logger.warn('Entity scrape failed, using saved definition', {
        year: options.year,
        error: err,
      });
    }
  }

  if (!existing) {
    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: `No entity definition available for ${options.year}`,
      context: { filePath: options.filePath },
      suggestion: 'Check API connectivity or provide the entity definition file.',
    });
  }
  return EntityRegistry.fromDefinition(existing);
}
