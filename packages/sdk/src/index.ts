export * from './errors.js';
export * from './ids.js';
export * from './time.js';
export * from './pagination.js';
export * from './keyed-lock.js';
export * from './run-status.js';
export * from './serializers.js';
export * from './types.js';
export * from './schemas/common.js';
export * from './schemas/threads.js';
export * from './schemas/runs.js';
export * from './schemas/resources.js';
export * from './schemas/events.js';
