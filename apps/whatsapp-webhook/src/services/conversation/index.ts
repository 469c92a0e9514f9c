export { DEFAULT_CONVERSATION_PREFIX } from './store';
export type { ConversationKey, ConversationStore, ConversationStoreContext } from './store';
export { conversationKey } from './conversation-key';
export { InMemoryConversationStore } from './in-memory-store';
export {
  RedisConversationStore,
  type RedisConversationClient,
  type RedisConversationStoreOptions,
} from './redis-store';
