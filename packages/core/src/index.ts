export * from './agents.js';
export * from './event-log.js';
export * from './event-publisher.js';
export * from './event-stream.js';
export * from './message-tree.js';
export * from './run-runner.js';
export * from './run-scheduler.js';
