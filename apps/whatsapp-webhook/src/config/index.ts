export { loadConfig, type AppConfig, type ConversationStoreDriver } from './env';
