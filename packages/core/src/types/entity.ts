/**
 * Entity types for the monitored election hierarchy
 */

/** Hierarchy level, from the whole nation down to a single voting district */
export type EntityLevel = 'nation' | 'county' | 'municipality' | 'district';

/** All levels, top-down */
export const ENTITY_LEVELS: readonly EntityLevel[] = [
  'nation',
  'county',
  'municipality',
  'district',
];

/** One monitored node in the hierarchy */
export interface Entity {
  /** Hierarchical identifier, unique across all levels (e.g. 'district-01-3001-0001') */
  readonly id: string;
  readonly level: EntityLevel;
  /** Level-specific code as used by the results API ('01', '3001', '0001') */
  readonly code: string;
  /** Display name, when the definition carries one */
  readonly name?: string;
  /** Parent entity id (undefined for the nation) */
  readonly parentId?: string;
  /** Upstream codes along the path, used to build API paths */
  readonly path: EntityPath;
}

export interface EntityPath {
  county?: string;
  municipality?: string;
  district?: string;
}

/** Static definition the registry is loaded from */
export interface EntityDefinition {
  counties: Array<{ code: string; name?: string }>;
  municipalities: Array<{ code: string; county: string; name?: string }>;
  districts: Array<{ code: string; county: string; municipality: string; name?: string }>;
}
