import { Redis } from 'ioredis';

import {
  DEFAULT_CONVERSATION_PREFIX,
  type ConversationKey,
  type ConversationStore,
  type ConversationStoreContext,
} from './store';

/** The subset of the ioredis client the store relies on. */
export interface RedisConversationClient {
  getBuffer(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer): Promise<unknown>;
}

/** Options used to configure the Redis-backed conversation store. */
export interface RedisConversationStoreOptions extends ConversationStoreContext {
  url?: string;
  /** Externally owned client; `close()` leaves it open. */
  client?: RedisConversationClient;
}

/** Conversation store backed by Redis; tokens are stored without expiry. */
export class RedisConversationStore implements ConversationStore {
  private readonly redis: RedisConversationClient;
  private readonly ownedClient?: Redis;
  private readonly prefix: string;

  constructor(options: RedisConversationStoreOptions = {}) {
    if (options.client) {
      this.redis = options.client;
    } else if (options.url) {
      // Managed Redis offerings are often IPv6-only; `family=0` lets ioredis pick either stack.
      const redisUrl = new URL(options.url);
      if (!redisUrl.searchParams.has('family')) {
        redisUrl.searchParams.set('family', '0');
      }

      this.ownedClient = new Redis(redisUrl.toString(), { lazyConnect: true });
      this.redis = this.ownedClient;
    } else {
      throw new Error('RedisConversationStore requires either a client or a url.');
    }

    this.prefix = options.prefix ?? DEFAULT_CONVERSATION_PREFIX;
  }

  async get(key: ConversationKey): Promise<Buffer | undefined> {
    await this.ensureConnected();
    const raw = await this.redis.getBuffer(this.namespaced(key));
    return raw ?? undefined;
  }

  async set(key: ConversationKey, value: Buffer): Promise<void> {
    await this.ensureConnected();
    await this.redis.set(this.namespaced(key), value);
  }

  async close(): Promise<void> {
    if (this.ownedClient) {
      await this.ownedClient.quit();
    }
  }

  private namespaced(key: ConversationKey): ConversationKey {
    return `${this.prefix}${key}`;
  }

  private async ensureConnected(): Promise<void> {
    if (!this.ownedClient) {
      return;
    }

    const status = this.ownedClient.status;
    if (status === 'ready' || status === 'connecting' || status === 'connect') {
      return;
    }

    await this.ownedClient.connect();
  }
}
