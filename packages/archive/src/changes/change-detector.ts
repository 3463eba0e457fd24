/**
 * Change Detector
 *
 * Decides whether a fetched document carries new information compared with the
 * latest stored snapshot. Only the tracked fields take part in the comparison;
 * volatile metadata such as report-generation stamps is ignored at any depth.
 */

import { z } from 'zod';
import {
  ArchiveError,
  formatZodIssues,
  type ElectionDocument,
  type Snapshot,
} from '@results-archive/core';
import { canonicalize, readPath } from './normalize.js';

export interface ChangeDetectionConfig {
  /** Dotted paths compared between documents */
  trackFields: string[];
  /** Key names dropped wherever they appear inside tracked fields */
  ignoreFields: string[];
}

/**
 * Vote totals, per-party results, count progress, seats and turnout. The
 * report timestamp (`tidspunkt.rapportGenerert`) changes on every fetch.
 */
export const DEFAULT_CHANGE_DETECTION: ChangeDetectionConfig = {
  trackFields: ['opptalt', 'stemmer', 'partier', 'mandater', 'frammote'],
  ignoreFields: ['tidspunkt', 'rapportGenerert'],
};

export const changeDetectionConfigSchema = z
  .object({
    trackFields: z.array(z.string().min(1)).min(1),
    ignoreFields: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .superRefine((value, ctx) => {
    const ignored = new Set(value.ignoreFields);
    value.trackFields.forEach((field, index) => {
      if (field.split('.').some((segment) => ignored.has(segment))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Tracked field '${field}' is also ignored`,
          path: ['trackFields', index],
        });
      }
    });
  });

export interface ChangeDetection {
  changed: boolean;
  /** Tracked fields whose canonical value differs */
  changedFields: string[];
}

export class ChangeDetector {
  private readonly fields: readonly string[];
  private readonly ignore: ReadonlySet<string>;

  constructor(config: ChangeDetectionConfig = DEFAULT_CHANGE_DETECTION) {
    const parsed = changeDetectionConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ArchiveError({
        code: 'CONFIG_ERROR',
        message: formatZodIssues('Invalid change detection config', parsed.error),
      });
    }
    this.fields = [...new Set(parsed.data.trackFields)];
    this.ignore = new Set(parsed.data.ignoreFields);
  }

  get trackedFields(): readonly string[] {
    return this.fields;
  }

  get ignoredFields(): readonly string[] {
    return [...this.ignore];
  }

  /**
   * Canonical form of every tracked field of a document.
   */
  fingerprint(document: ElectionDocument): Record<string, string> {
    const out: Record<string, string> = {};
    for (const field of this.fields) {
      out[field] = canonicalize(readPath(document, field), this.ignore);
    }
    return out;
  }

  detect(previous: Snapshot | undefined, candidate: ElectionDocument): ChangeDetection {
    // First observation of an entity is always material
    if (!previous) {
      return { changed: true, changedFields: [] };
    }

    const before = this.fingerprint(previous.content);
    const after = this.fingerprint(candidate);
    const changedFields = this.fields.filter((field) => before[field] !== after[field]);

    return { changed: changedFields.length > 0, changedFields };
  }

  hasChanged(previous: Snapshot | undefined, candidate: ElectionDocument): boolean {
    return this.detect(previous, candidate).changed;
  }
}
