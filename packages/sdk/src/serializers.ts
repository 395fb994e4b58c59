import { encodeUnix } from './time.js';
import { getRunStatus, getRunStepStatus } from './run-status.js';
import type { ContentBlock, Message, MessageRole, Thread } from './schemas/threads.js';
import type { Run, RunError, RunStatus, RunStep, RunStepDetails, RunStepStatus } from './schemas/runs.js';
import type {
  Assistant,
  Execution,
  FileObject,
  McpConfig,
  McpServer,
  Workflow,
} from './schemas/resources.js';

function unix(date: Date): number;
function unix(date: Date | null): number | null;
function unix(date: Date | null): number | null {
  return date === null ? null : encodeUnix(date);
}

export interface ThreadObject {
  id: string;
  object: 'thread';
  created_at: number;
  name: string | null;
  workspace_id: string | null;
}

export function toThreadObject(thread: Thread): ThreadObject {
  return {
    id: thread.id,
    object: 'thread',
    created_at: unix(thread.createdAt),
    name: thread.name,
    workspace_id: thread.workspaceId,
  };
}

export interface MessageObject {
  id: string;
  object: 'thread.message';
  thread_id: string;
  parent_id: string;
  created_at: number;
  role: MessageRole;
  content: ContentBlock[];
  assistant_id: string | null;
  run_id: string | null;
}

export function toMessageObject(message: Message): MessageObject {
  return {
    id: message.id,
    object: 'thread.message',
    thread_id: message.threadId,
    parent_id: message.parentId,
    created_at: unix(message.createdAt),
    role: message.role,
    content: message.content,
    assistant_id: message.assistantId,
    run_id: message.runId,
  };
}

export type IndexedContentBlock = ContentBlock & { index: number };

export interface MessageDeltaObject {
  id: string;
  object: 'thread.message.delta';
  delta: {
    role: MessageRole;
    content: IndexedContentBlock[];
  };
}

export interface RunObject {
  id: string;
  object: 'thread.run';
  thread_id: string;
  assistant_id: string;
  model: string;
  instructions: string | null;
  status: RunStatus;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  failed_at: number | null;
  cancelled_at: number | null;
  tried_cancelling_at: number | null;
  expires_at: number;
  last_error: RunError | null;
}

export function toRunObject(run: Run, at: Date = new Date()): RunObject {
  return {
    id: run.id,
    object: 'thread.run',
    thread_id: run.threadId,
    assistant_id: run.assistantId,
    model: run.model,
    instructions: run.instructions,
    status: getRunStatus(run, at),
    created_at: unix(run.createdAt),
    started_at: unix(run.startedAt),
    completed_at: unix(run.completedAt),
    failed_at: unix(run.failedAt),
    cancelled_at: unix(run.cancelledAt),
    tried_cancelling_at: unix(run.triedCancellingAt),
    expires_at: unix(run.expiresAt),
    last_error: run.lastError,
  };
}

export interface RunStepObject {
  id: string;
  object: 'thread.run.step';
  run_id: string;
  thread_id: string;
  assistant_id: string;
  type: RunStepDetails['type'];
  status: RunStepStatus;
  step_details: RunStepDetails;
  created_at: number;
  completed_at: number | null;
  failed_at: number | null;
  cancelled_at: number | null;
  expired_at: number | null;
  last_error: RunError | null;
}

export function toRunStepObject(step: RunStep): RunStepObject {
  return {
    id: step.id,
    object: 'thread.run.step',
    run_id: step.runId,
    thread_id: step.threadId,
    assistant_id: step.assistantId,
    type: step.type,
    status: getRunStepStatus(step),
    step_details: step.stepDetails,
    created_at: unix(step.createdAt),
    completed_at: unix(step.completedAt),
    failed_at: unix(step.failedAt),
    cancelled_at: unix(step.cancelledAt),
    expired_at: unix(step.expiredAt),
    last_error: step.lastError,
  };
}

export interface RunStepDeltaObject {
  id: string;
  object: 'thread.run.step.delta';
  delta: {
    step_details: {
      type: 'tool_calls';
      tool_calls: Array<{
        index: number;
        id?: string;
        type: 'function';
        function: { name?: string; arguments?: string; output?: string | null };
      }>;
    };
  };
}

export interface AssistantObject {
  id: string;
  object: 'assistant';
  workspace_id: string | null;
  created_at: number;
  name: string | null;
  description: string | null;
  avatar: string | null;
  tools: string[];
  system: string | null;
}

export function toAssistantObject(assistant: Assistant): AssistantObject {
  return {
    id: assistant.id,
    object: 'assistant',
    workspace_id: assistant.workspaceId,
    created_at: unix(assistant.createdAt),
    name: assistant.name,
    description: assistant.description,
    avatar: assistant.avatar,
    tools: assistant.tools,
    system: assistant.system,
  };
}

export interface WorkflowObject {
  id: string;
  object: 'workflow';
  workspace_id: string | null;
  created_at: number;
  name: string;
  description: string;
  tags: string[];
  assistant_id: string;
}

export function toWorkflowObject(workflow: Workflow): WorkflowObject {
  return {
    id: workflow.id,
    object: 'workflow',
    workspace_id: workflow.workspaceId,
    created_at: unix(workflow.createdAt),
    name: workflow.name,
    description: workflow.description,
    tags: workflow.tags,
    assistant_id: workflow.assistantId,
  };
}

export interface FileObjectResponse {
  id: string;
  object: 'file';
  workspace_id: string | null;
  created_at: number;
  filename: string;
  size: number;
  media_type: string;
}

export function toFileObject(file: FileObject): FileObjectResponse {
  return {
    id: file.id,
    object: 'file',
    workspace_id: file.workspaceId,
    created_at: unix(file.createdAt),
    filename: file.filename,
    size: file.size,
    media_type: file.mediaType,
  };
}

export interface McpConfigObject {
  id: string;
  object: 'mcp_config';
  workspace_id: string | null;
  created_at: number;
  name: string;
  mcp_server: McpServer;
}

export function toMcpConfigObject(config: McpConfig): McpConfigObject {
  return {
    id: config.id,
    object: 'mcp_config',
    workspace_id: config.workspaceId,
    created_at: unix(config.createdAt),
    name: config.name,
    mcp_server: config.mcpServer,
  };
}

export interface ExecutionObject {
  id: string;
  object: 'workflow_execution';
  workspace_id: string | null;
  created_at: number;
  workflow_id: string;
  thread_id: string;
  run_id: string;
  status: RunStatus;
}

export function toExecutionObject(execution: Execution, run: Run, at: Date = new Date()): ExecutionObject {
  return {
    id: execution.id,
    object: 'workflow_execution',
    workspace_id: execution.workspaceId,
    created_at: unix(execution.createdAt),
    workflow_id: execution.workflowId,
    thread_id: execution.threadId,
    run_id: execution.runId,
    status: getRunStatus(run, at),
  };
}
