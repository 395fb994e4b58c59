import {
  ID_PREFIXES,
  InvalidArgumentError,
  KeyedLock,
  NotFoundError,
  ROOT_MESSAGE_PARENT_ID,
  generateId,
  now,
  toListResponse,
  type ContentBlock,
  type ListQuery,
  type ListResponse,
  type Message,
  type MessageRole,
} from '@threadline/sdk';
import type { MessageRepository } from '@threadline/db';

export interface CreateMessageInput {
  /** Defaults to the latest leaf of the main branch. */
  parentId?: string;
  role: MessageRole;
  content: ContentBlock[];
  assistantId?: string | null;
  runId?: string | null;
  /** Pre-reserved id, used when deltas were streamed before the message existed. */
  id?: string;
}

interface ThreadIndex {
  messages: Map<string, Message>;
  /** Child ids per parent, ascending. */
  children: Map<string, string[]>;
}

function addChild(index: ThreadIndex, message: Message): void {
  index.messages.set(message.id, message);
  const siblings = index.children.get(message.parentId) ?? [];
  siblings.push(message.id);
  siblings.sort();
  index.children.set(message.parentId, siblings);
}

/** Follows the most recent child from `fromId` until a node has none. */
function latestLeaf(index: ThreadIndex, fromId: string): string {
  let current = fromId;
  for (;;) {
    const children = index.children.get(current);
    const latest = children?.[children.length - 1];
    if (latest === undefined) return current;
    current = latest;
  }
}

/** Ancestors of `id` up to the root, oldest first, excluding `id` and anything above `stopAt`. */
function ancestors(index: ThreadIndex, id: string, stopAt = ROOT_MESSAGE_PARENT_ID): Message[] {
  const path: Message[] = [];
  let current = index.messages.get(id);
  while (current && current.parentId !== stopAt) {
    const parent = index.messages.get(current.parentId);
    if (!parent) break;
    path.push(parent);
    current = parent;
  }
  return path.reverse();
}

export interface MessageTreeOptions {
  /** Thread indexes kept in memory; the least recently used is dropped first. */
  maxCachedThreads?: number;
}

export const DEFAULT_MAX_CACHED_THREADS = 1000;

/**
 * Messages of a thread form a forest linked by `parentId`. The store keeps a
 * per-thread adjacency index so branch resolution never rescans the thread.
 * Every operation on a thread runs under that thread's lock, so an implicit
 * parent is resolved and inserted before the next one is resolved.
 */
export class MessageTreeStore {
  private readonly indexes = new Map<string, Promise<ThreadIndex>>();
  private readonly locks = new KeyedLock();
  private readonly maxCachedThreads: number;

  constructor(
    private readonly messages: MessageRepository,
    options: MessageTreeOptions = {}
  ) {
    this.maxCachedThreads = Math.max(1, options.maxCachedThreads ?? DEFAULT_MAX_CACHED_THREADS);
  }

  private index(threadId: string): Promise<ThreadIndex> {
    let index = this.indexes.get(threadId);
    if (index) {
      // Re-insert to mark as most recently used.
      this.indexes.delete(threadId);
      this.indexes.set(threadId, index);
      return index;
    }
    index = this.load(threadId);
    this.indexes.set(threadId, index);
    index.catch(() => this.indexes.delete(threadId));
    for (const oldest of this.indexes.keys()) {
      if (this.indexes.size <= this.maxCachedThreads) break;
      this.indexes.delete(oldest);
    }
    return index;
  }

  private exclusive<T>(threadId: string, task: (index: ThreadIndex) => Promise<T> | T): Promise<T> {
    return this.locks.run(threadId, async () => task(await this.index(threadId)));
  }

  /** Threads whose index is held in memory. */
  get cachedThreads(): number {
    return this.indexes.size;
  }

  private async load(threadId: string): Promise<ThreadIndex> {
    const index: ThreadIndex = { messages: new Map(), children: new Map() };
    for (const message of await this.messages.findByThread(threadId)) {
      addChild(index, message);
    }
    return index;
  }

  createMessage(threadId: string, input: CreateMessageInput): Promise<Message> {
    return this.exclusive(threadId, (index) => this.insert(index, threadId, input));
  }

  private async insert(index: ThreadIndex, threadId: string, input: CreateMessageInput): Promise<Message> {
    const parentId = input.parentId ?? latestLeaf(index, ROOT_MESSAGE_PARENT_ID);
    if (parentId !== ROOT_MESSAGE_PARENT_ID && !index.messages.has(parentId)) {
      throw NotFoundError.forResource('Message', parentId);
    }

    const message: Message = {
      id: input.id ?? generateId(ID_PREFIXES.message),
      threadId,
      parentId,
      createdAt: now(),
      role: input.role,
      content: input.content,
      assistantId: input.assistantId ?? null,
      runId: input.runId ?? null,
    };
    await this.messages.create(message);
    addChild(index, message);
    return message;
  }

  getMessage(threadId: string, id: string): Promise<Message> {
    return this.exclusive(threadId, (index) => this.require(index, id));
  }

  /** Root to the most recent leaf, oldest first. */
  mainBranch(threadId: string): Promise<Message[]> {
    return this.exclusive(threadId, (index) => this.pathTo(index, latestLeaf(index, ROOT_MESSAGE_PARENT_ID)));
  }

  /**
   * Pages along a path of the tree. Without a cursor the path is the main
   * branch; `after` walks down from the cursor to its latest leaf and
   * `before` walks up from the cursor to the root. Cursors are exclusive.
   */
  async listMessages(threadId: string, query: ListQuery): Promise<ListResponse<Message>> {
    if (query.after !== undefined && query.before !== undefined) {
      throw new InvalidArgumentError("Only one of 'after' and 'before' may be set");
    }
    return this.exclusive(threadId, (index) => this.page(index, query));
  }

  private page(index: ThreadIndex, query: ListQuery): ListResponse<Message> {
    const cursor = query.after ?? query.before;
    if (cursor !== undefined && !index.messages.has(cursor)) {
      throw NotFoundError.forResource('Message', cursor);
    }

    // Nodes ordered nearest to the cursor first; without a cursor, in the requested order.
    let nearestFirst: Message[];
    let nearestOrder: ListQuery['order'];
    if (query.after !== undefined) {
      const leaf = latestLeaf(index, query.after);
      nearestFirst = leaf === query.after ? [] : [...ancestors(index, leaf, query.after), this.require(index, leaf)];
      nearestOrder = 'asc';
    } else if (query.before !== undefined) {
      nearestFirst = ancestors(index, query.before).reverse();
      nearestOrder = 'desc';
    } else {
      const branch = this.pathTo(index, latestLeaf(index, ROOT_MESSAGE_PARENT_ID));
      nearestFirst = query.order === 'asc' ? branch : branch.reverse();
      nearestOrder = query.order;
    }

    const page = nearestFirst.slice(0, query.limit);
    if (nearestOrder !== query.order) page.reverse();
    return toListResponse(page, nearestFirst.length > query.limit, (message) => message.id);
  }

  /** Removes the message and its whole subtree. */
  deleteMessage(threadId: string, id: string): Promise<string[]> {
    return this.exclusive(threadId, (index) => this.removeSubtree(index, threadId, id));
  }

  private async removeSubtree(index: ThreadIndex, threadId: string, id: string): Promise<string[]> {
    const message = this.require(index, id);

    const doomed: string[] = [];
    const pending = [id];
    for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
      doomed.push(next);
      pending.push(...(index.children.get(next) ?? []));
    }

    await this.messages.deleteMany(threadId, doomed);

    for (const doomedId of doomed) {
      index.messages.delete(doomedId);
      index.children.delete(doomedId);
    }
    const siblings = index.children.get(message.parentId)?.filter((sibling) => sibling !== id) ?? [];
    if (siblings.length > 0) {
      index.children.set(message.parentId, siblings);
    } else {
      index.children.delete(message.parentId);
    }
    return doomed;
  }

  forgetThread(threadId: string): void {
    this.indexes.delete(threadId);
  }

  private require(index: ThreadIndex, id: string): Message {
    const message = index.messages.get(id);
    if (!message) throw NotFoundError.forResource('Message', id);
    return message;
  }

  private pathTo(index: ThreadIndex, leafId: string): Message[] {
    if (leafId === ROOT_MESSAGE_PARENT_ID) return [];
    return [...ancestors(index, leafId), this.require(index, leafId)];
  }
}
