export { ArchiveError, isArchiveError, wrapError } from './archive-error.js';
export type { ArchiveErrorCode, ArchiveErrorDetails } from './archive-error.js';
