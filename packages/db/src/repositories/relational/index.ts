import type { DbClient } from '../../client.js';
import type { Repositories } from '../types.js';
import { RelationalAssistantRepository } from './assistants.js';
import { RelationalEventRepository } from './events.js';
import { RelationalExecutionRepository } from './executions.js';
import { RelationalFileRepository } from './files.js';
import { RelationalMcpConfigRepository } from './mcp-configs.js';
import { RelationalMessageRepository } from './messages.js';
import { RelationalRunStepRepository } from './run-steps.js';
import { RelationalRunRepository } from './runs.js';
import { RelationalThreadRepository } from './threads.js';
import { RelationalWorkflowRepository } from './workflows.js';

export function createRelationalRepositories(db: DbClient): Repositories {
  return {
    threads: new RelationalThreadRepository(db),
    messages: new RelationalMessageRepository(db),
    runs: new RelationalRunRepository(db),
    runSteps: new RelationalRunStepRepository(db),
    events: new RelationalEventRepository(db),
    assistants: new RelationalAssistantRepository(db),
    workflows: new RelationalWorkflowRepository(db),
    files: new RelationalFileRepository(db),
    mcpConfigs: new RelationalMcpConfigRepository(db),
    executions: new RelationalExecutionRepository(db),
  };
}

export {
  RelationalAssistantRepository,
  RelationalEventRepository,
  RelationalExecutionRepository,
  RelationalFileRepository,
  RelationalMcpConfigRepository,
  RelationalMessageRepository,
  RelationalRunRepository,
  RelationalRunStepRepository,
  RelationalThreadRepository,
  RelationalWorkflowRepository,
};
