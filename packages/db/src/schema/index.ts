export * from './threads.js';
export * from './messages.js';
export * from './runs.js';
export * from './events.js';
export * from './run-steps.js';
export * from './assistants.js';
export * from './workflows.js';
export * from './files.js';
export * from './mcp-configs.js';
export * from './executions.js';
export * from './migration-version.js';
