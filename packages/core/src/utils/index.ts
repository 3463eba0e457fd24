export * from './timestamp.js';
export * from './keyed-lock.js';
export * from './semaphore.js';
