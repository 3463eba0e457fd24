export * from './entity.js';
export * from './snapshot.js';
