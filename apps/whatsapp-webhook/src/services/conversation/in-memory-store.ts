import {
  DEFAULT_CONVERSATION_PREFIX,
  type ConversationKey,
  type ConversationStore,
  type ConversationStoreContext,
} from './store';

/** Map-based conversation store used for local development and tests. */
export class InMemoryConversationStore implements ConversationStore {
  private readonly store = new Map<ConversationKey, Buffer>();
  private readonly prefix: string;

  constructor(context: ConversationStoreContext = {}) {
    this.prefix = context.prefix ?? DEFAULT_CONVERSATION_PREFIX;
  }

  async get(key: ConversationKey): Promise<Buffer | undefined> {
    const value = this.store.get(this.namespaced(key));
    return value ? Buffer.from(value) : undefined;
  }

  async set(key: ConversationKey, value: Buffer): Promise<void> {
    this.store.set(this.namespaced(key), Buffer.from(value));
  }

  get size(): number {
    return this.store.size;
  }

  private namespaced(key: ConversationKey): ConversationKey {
    return `${this.prefix}${key}`;
  }
}
