import type { ChatMessage } from "../types.js";

class SerialQueue {
  private tail = Promise.resolve();
  private pending = 0;

  get size() {
    return this.pending;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task, task).finally(() => {
      this.pending -= 1;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export type ConversationSession = {
  readonly chatId: number;
  messages: ChatMessage[];
  model: string;
  lastActiveAt: number;
};

export type ConversationStoreOptions = {
  systemInstruction: ChatMessage;
  defaultModel: string;
  /** Sessions idle for longer than this are evicted by `evictIdle`; 0 disables eviction. */
  idleTtlMs?: number;
  now?: () => number;
};

export class ConversationStore {
  private sessions = new Map<number, ConversationSession>();
  private queues = new Map<number, SerialQueue>();
  private readonly now: () => number;

  constructor(private options: ConversationStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get size() {
    return this.sessions.size;
  }

  get(chatId: number): ConversationSession | undefined {
    return this.sessions.get(chatId);
  }

  getOrCreate(chatId: number): ConversationSession {
    const existing = this.sessions.get(chatId);
    if (existing) {
      existing.lastActiveAt = this.now();
      return existing;
    }
    const session: ConversationSession = {
      chatId,
      messages: [this.options.systemInstruction],
      model: this.options.defaultModel,
      lastActiveAt: this.now()
    };
    this.sessions.set(chatId, session);
    return session;
  }

  setModel(chatId: number, model: string): ConversationSession | undefined {
    const session = this.sessions.get(chatId);
    if (!session) {
      return undefined;
    }
    session.model = model;
    return session;
  }

  reset(chatId: number): ConversationSession | undefined {
    const session = this.sessions.get(chatId);
    if (!session) {
      return undefined;
    }
    session.messages = [this.options.systemInstruction];
    return session;
  }

  /** Serializes work per chat; different chats run concurrently. */
  run<T>(chatId: number, task: () => Promise<T>): Promise<T> {
    const queue = this.queues.get(chatId) ?? new SerialQueue();
    this.queues.set(chatId, queue);
    return queue.enqueue(task).finally(() => {
      if (queue.size === 0 && this.queues.get(chatId) === queue) {
        this.queues.delete(chatId);
      }
    });
  }

  evictIdle(now = this.now()): number {
    const ttl = this.options.idleTtlMs ?? 0;
    if (ttl <= 0) {
      return 0;
    }
    let evicted = 0;
    for (const [chatId, session] of this.sessions) {
      if (this.queues.has(chatId)) {
        continue;
      }
      if (now - session.lastActiveAt > ttl) {
        this.sessions.delete(chatId);
        evicted += 1;
      }
    }
    return evicted;
  }
}
