import type { ElectionDocument } from '@results-archive/core';
import { EntityRegistry } from '../src/registry/index.js';

export const definition = {
  counties: [
    { code: '01', name: 'Østfold' },
    { code: '03', name: 'Oslo' },
  ],
  municipalities: [
    { code: '3001', county: '01', name: 'Halden' },
    { code: '0301', county: '03', name: 'Oslo' },
  ],
  districts: [
    { code: '0001', county: '01', municipality: '3001', name: 'Idd' },
    { code: '0002', county: '01', municipality: '3001', name: 'Sentrum' },
  ],
};

export function buildRegistry(): EntityRegistry {
  return EntityRegistry.fromDefinition(definition);
}

/**
 * Results document shaped like the upstream API, with a report stamp that
 * changes on every fetch.
 */
export function resultDocument(
  votes: { ap: number; h: number },
  generatedAt = '2025-09-08T20:00:00Z'
): ElectionDocument {
  return {
    id: { nivaa: 'stemmekrets', navn: 'Idd' },
    tidspunkt: { rapportGenerert: generatedAt },
    opptalt: { prosent: 50.5 },
    stemmer: { total: votes.ap + votes.h },
    partier: [
      { id: { partikode: 'A' }, stemmer: { resultat: { antall: { total: votes.ap } } } },
      { id: { partikode: 'H' }, stemmer: { resultat: { antall: { total: votes.h } } } },
    ],
  };
}

export function at(iso: string): Date {
  return new Date(iso);
}

export function isoList(dates: Date[]): string[] {
  return dates.map((date) => date.toISOString());
}
