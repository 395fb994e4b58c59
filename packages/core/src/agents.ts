import type {
  Assistant,
  ContentBlock,
  Logger,
  Message,
  MessageRole,
  Run,
} from '@threadline/sdk';

export interface AgentContext {
  run: Run;
  assistant: Assistant;
  /** Main branch of the thread when the run started, oldest first. */
  history: Message[];
  signal: AbortSignal;
  logger: Logger;
}

/** Incremental message output. Each `write` becomes one `thread.message.delta`. */
export interface MessageWriter {
  readonly id: string;
  write(text: string): Promise<void>;
  /** Persists the assembled message and emits `thread.message.created`. */
  finish(): Promise<Message>;
}

export interface ToolCallHandle {
  readonly stepId: string;
  readonly callId: string;
  appendArguments(chunk: string): Promise<void>;
  complete(output: string): Promise<void>;
  fail(message: string): Promise<void>;
}

/**
 * What an agent may do inside a run. Every call is a suspension point where
 * cancellation and expiry are observed through `shouldContinue`.
 */
export interface AgentSession {
  /** Appends below the previous message of the run; false when the agent must stop. */
  emitMessage(input: { role: MessageRole; content: ContentBlock[] }): Promise<boolean>;
  streamMessage(role: MessageRole): MessageWriter;
  startToolCall(call: { name: string; arguments: string }): Promise<ToolCallHandle>;
  shouldContinue(): Promise<boolean>;
}

export interface Agent {
  act(context: AgentContext, session: AgentSession): Promise<void>;
}

/** Resolves the agent bound to an assistant, or the fallback. */
export class AgentRegistry {
  private readonly agents = new Map<string, Agent>();

  constructor(private readonly fallback: Agent) {}

  register(assistantId: string, agent: Agent): this {
    this.agents.set(assistantId, agent);
    return this;
  }

  resolve(assistantId: string): Agent {
    return this.agents.get(assistantId) ?? this.fallback;
  }
}

export function messageText(message: Message): string {
  return message.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Built-in agent without a model provider. It answers the last user message
 * and calls `system.ping` first when that message mentions a ping.
 */
export class EchoAgent implements Agent {
  async act({ history }: AgentContext, session: AgentSession): Promise<void> {
    const lastUser = [...history].reverse().find((message) => message.role === 'user');
    const input = lastUser ? messageText(lastUser) : '';

    if (input.toLowerCase().includes('ping')) {
      const call = await session.startToolCall({ name: 'system.ping', arguments: '' });
      await call.appendArguments('{}');
      await call.complete(JSON.stringify({ ok: true, ts: new Date().toISOString() }));
      if (!(await session.shouldContinue())) return;
    }

    const reply = input.length > 0 ? `I received your message: "${input}".` : 'I received no message.';
    const writer = session.streamMessage('assistant');
    for (const chunk of reply.match(/\S+\s*/g) ?? [reply]) {
      await writer.write(chunk);
    }
    if (!(await session.shouldContinue())) return;
    await writer.finish();
  }
}
