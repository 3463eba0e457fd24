/**
 * Retention Module
 */

export { RetentionEnforcer } from './retention-enforcer.js';
export type { RetentionOptions, SweepFailure, SweepResult } from './retention-enforcer.js';
export {
  DEFAULT_ACTIVE_MONTHS,
  DEFAULT_RETENTION_POLICY,
  activeMonthsSchema,
  classifyPeriod,
  retentionCutoff,
  retentionPolicySchema,
  retentionRuleSchema,
  validateActiveMonths,
  validateRetentionPolicy,
} from './policy.js';
export type { RetentionPolicyTable, RetentionRule } from './policy.js';
