/**
 * Retention policy table and period classification
 */

import { z } from 'zod';
import {
  ArchiveError,
  formatZodIssues,
  type EntityLevel,
  type RetentionPeriod,
} from '@results-archive/core';

/** What a level keeps during one period */
export type RetentionRule =
  | { keep: 'all' }
  | { keep: 'latest' }
  | { keep: 'window'; days: number };

export type RetentionPolicyTable = Record<EntityLevel, Record<RetentionPeriod, RetentionRule>>;

/** September and October: election season */
export const DEFAULT_ACTIVE_MONTHS: readonly number[] = [9, 10];

export const DEFAULT_RETENTION_POLICY: RetentionPolicyTable = {
  nation: { active: { keep: 'window', days: 365 }, quiet: { keep: 'all' } },
  county: { active: { keep: 'window', days: 180 }, quiet: { keep: 'latest' } },
  municipality: { active: { keep: 'window', days: 90 }, quiet: { keep: 'latest' } },
  district: { active: { keep: 'window', days: 30 }, quiet: { keep: 'latest' } },
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const retentionRuleSchema = z.discriminatedUnion('keep', [
  z.object({ keep: z.literal('all') }).strict(),
  z.object({ keep: z.literal('latest') }).strict(),
  z.object({ keep: z.literal('window'), days: z.number().int().positive() }).strict(),
]);

const levelPolicySchema = z
  .object({
    active: retentionRuleSchema,
    quiet: retentionRuleSchema,
  })
  .strict();

export const retentionPolicySchema = z
  .object({
    nation: levelPolicySchema,
    county: levelPolicySchema,
    municipality: levelPolicySchema,
    district: levelPolicySchema,
  })
  .strict();

export const activeMonthsSchema = z.array(z.number().int().min(1).max(12));

/**
 * Validate a policy table at startup.
 *
 * @throws ArchiveError CONFIG_ERROR when a (level, period) entry is missing or invalid
 */
export function validateRetentionPolicy(input: unknown): RetentionPolicyTable {
  const parsed = retentionPolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: formatZodIssues('Invalid retention policy', parsed.error),
      suggestion: 'Every level needs both an active and a quiet rule.',
    });
  }
  return parsed.data;
}

export function validateActiveMonths(input: unknown): number[] {
  const parsed = activeMonthsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ArchiveError({
      code: 'CONFIG_ERROR',
      message: formatZodIssues('Invalid active months', parsed.error),
    });
  }
  return parsed.data;
}

/**
 * Active period when the UTC month of `now` is one of `activeMonths` (1-12).
 */
export function classifyPeriod(
  now: Date,
  activeMonths: readonly number[] = DEFAULT_ACTIVE_MONTHS
): RetentionPeriod {
  return activeMonths.includes(now.getUTCMonth() + 1) ? 'active' : 'quiet';
}

/**
 * Snapshots strictly older than the returned instant are outside the window.
 * Undefined means the rule never expires anything by age.
 */
export function retentionCutoff(rule: RetentionRule, now: Date): Date | undefined {
  return rule.keep === 'window' ? new Date(now.getTime() - rule.days * DAY_MS) : undefined;
}
