export * from './client.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
export * from './blob-store.js';
export * from './migrations/index.js';
