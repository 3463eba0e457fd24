/**
 * Change Detection Module
 */

export {
  ChangeDetector,
  DEFAULT_CHANGE_DETECTION,
  changeDetectionConfigSchema,
} from './change-detector.js';
export type { ChangeDetection, ChangeDetectionConfig } from './change-detector.js';
export { canonicalize, normalizeValue, readPath } from './normalize.js';
export type { NormalizedValue } from './normalize.js';
