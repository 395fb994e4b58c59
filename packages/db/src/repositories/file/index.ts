import type { Repositories } from '../types.js';
import {
  FileAssistantRepository,
  FileExecutionRepository,
  FileFileRepository,
  FileMcpConfigRepository,
  FileWorkflowRepository,
} from './resources.js';
import {
  FileEventRepository,
  FileMessageRepository,
  FileRunRepository,
  FileRunStepRepository,
  FileThreadRepository,
  ThreadLayout,
} from './threads.js';

/** Directory names of the file store under the data dir. */
export const FILE_STORE_KINDS = [
  'threads',
  'assistants',
  'workflows',
  'files',
  'mcp_configs',
  'executions',
] as const;

export function createFileRepositories(dataDir: string): Repositories {
  const layout = new ThreadLayout(dataDir);
  const executions = new FileExecutionRepository(dataDir);
  return {
    threads: new FileThreadRepository(layout, executions),
    messages: new FileMessageRepository(layout),
    runs: new FileRunRepository(layout),
    runSteps: new FileRunStepRepository(layout),
    events: new FileEventRepository(layout),
    assistants: new FileAssistantRepository(dataDir),
    workflows: new FileWorkflowRepository(dataDir),
    files: new FileFileRepository(dataDir),
    mcpConfigs: new FileMcpConfigRepository(dataDir),
    executions,
  };
}

export * from './resources.js';
export * from './threads.js';
export { JsonFileStore, serializeEntity } from './store.js';
