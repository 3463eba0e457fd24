/**
 * Entity Registry
 *
 * Read-only view of the monitored hierarchy (nation, counties, municipalities,
 * voting districts), built once from a static definition.
 */

import { readFile } from 'node:fs/promises';
import {
  ArchiveError,
  entityDefinitionSchema,
  formatZodIssues,
  type Entity,
  type EntityLevel,
} from '@results-archive/core';

export const NATION_ID = 'nation';

export function countyId(county: string): string {
  return `county-${county}`;
}

export function municipalityId(county: string, municipality: string): string {
  return `municipality-${county}-${municipality}`;
}

export function districtId(county: string, municipality: string, district: string): string {
  return `district-${county}-${municipality}-${district}`;
}

function configError(message: string, context?: Record<string, unknown>): ArchiveError {
  return new ArchiveError({
    code: 'CONFIG_ERROR',
    message,
    context,
    suggestion: 'Fix the entity definition and restart.',
  });
}

export class EntityRegistry {
  private readonly byId = new Map<string, Entity>();
  private readonly childIds = new Map<string, string[]>();

  private constructor(entities: Entity[]) {
    for (const entity of entities) {
      this.byId.set(entity.id, entity);
      if (entity.parentId) {
        const siblings = this.childIds.get(entity.parentId) ?? [];
        siblings.push(entity.id);
        this.childIds.set(entity.parentId, siblings);
      }
    }
  }

  /**
   * Build a registry from an untrusted definition.
   *
   * @throws ArchiveError CONFIG_ERROR on schema violations, duplicate ids or
   *   orphaned parent references
   */
  static fromDefinition(input: unknown): EntityRegistry {
    const parsed = entityDefinitionSchema.safeParse(input);
    if (!parsed.success) {
      throw configError(formatZodIssues('Invalid entity definition', parsed.error));
    }
    const definition = parsed.data;

    const nation: Entity = { id: NATION_ID, level: 'nation', code: NATION_ID, path: {} };
    const entities: Entity[] = [nation];
    const seen = new Set<string>([NATION_ID]);

    const add = (entity: Entity, index: number) => {
      if (seen.has(entity.id)) {
        throw configError(`Duplicate ${entity.level} '${entity.id}'`, {
          level: entity.level,
          index,
        });
      }
      seen.add(entity.id);
      entities.push(entity);
    };

    definition.counties.forEach((county, index) => {
      add(
        {
          id: countyId(county.code),
          level: 'county',
          code: county.code,
          name: county.name,
          parentId: NATION_ID,
          path: { county: county.code },
        },
        index
      );
    });

    // Municipality codes are nationally unique upstream; remember which county owns each
    const municipalityCounty = new Map<string, string>();
    definition.municipalities.forEach((municipality, index) => {
      const parentId = countyId(municipality.county);
      if (!seen.has(parentId)) {
        throw configError(
          `Municipality '${municipality.code}' references unknown county '${municipality.county}'`,
          { level: 'municipality', index }
        );
      }
      if (municipalityCounty.has(municipality.code)) {
        throw configError(`Duplicate municipality '${municipality.code}'`, {
          level: 'municipality',
          index,
        });
      }
      municipalityCounty.set(municipality.code, municipality.county);
      add(
        {
          id: municipalityId(municipality.county, municipality.code),
          level: 'municipality',
          code: municipality.code,
          name: municipality.name,
          parentId,
          path: { county: municipality.county, municipality: municipality.code },
        },
        index
      );
    });

    definition.districts.forEach((district, index) => {
      const owner = municipalityCounty.get(district.municipality);
      if (owner === undefined) {
        throw configError(
          `District '${district.code}' references unknown municipality '${district.municipality}'`,
          { level: 'district', index }
        );
      }
      if (owner !== district.county) {
        throw configError(
          `District '${district.code}' places municipality '${district.municipality}' in county '${district.county}', but it belongs to county '${owner}'`,
          { level: 'district', index }
        );
      }
      add(
        {
          id: districtId(district.county, district.municipality, district.code),
          level: 'district',
          code: district.code,
          name: district.name,
          parentId: municipalityId(district.county, district.municipality),
          path: {
            county: district.county,
            municipality: district.municipality,
            district: district.code,
          },
        },
        index
      );
    });

    return new EntityRegistry(entities);
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * Look up an entity by level and id. Returns undefined when the id is
   * unknown or belongs to another level.
   */
  resolve(level: EntityLevel, id: string): Entity | undefined {
    const entity = this.byId.get(id);
    return entity?.level === level ? entity : undefined;
  }

  get(id: string): Entity | undefined {
    return this.byId.get(id);
  }

  getOrThrow(id: string): Entity {
    const entity = this.byId.get(id);
    if (!entity) {
      throw new ArchiveError({
        code: 'ENTITY_NOT_FOUND',
        message: `Entity '${id}' is not registered`,
        context: { entityId: id },
      });
    }
    return entity;
  }

  children(entity: Entity): Entity[] {
    const ids = this.childIds.get(entity.id) ?? [];
    return ids.map((id) => this.getOrThrow(id));
  }

  /** All entities, top-down in definition order */
  allEntities(): Entity[] {
    return Array.from(this.byId.values());
  }

  byLevel(level: EntityLevel): Entity[] {
    return this.allEntities().filter((entity) => entity.level === level);
  }
}

export async function loadEntityRegistry(filePath: string): Promise<EntityRegistry> {
  let raw: unknown;
  try {
    const content = await readFile(filePath, 'utf-8');
    raw = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: `Failed to read entity definition '${filePath}'`,
      cause: err instanceof Error ? err : undefined,
      suggestion: 'Run the scrape command to create the entity definition.',
    });
  }
  return EntityRegistry.fromDefinition(raw);
}
