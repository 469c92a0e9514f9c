export type ConversationKey = string;

/**
 * Key-value capability holding one continuity token per conversation. Writes
 * overwrite; entries never expire on their own.
 */
export interface ConversationStore {
  get(key: ConversationKey): Promise<Buffer | undefined>;
  set(key: ConversationKey, value: Buffer): Promise<void>;
}

/** Optional configuration for conversation store instances. */
export interface ConversationStoreContext {
  prefix?: string;
}

export const DEFAULT_CONVERSATION_PREFIX = 'conversation:';
