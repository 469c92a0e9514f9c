export {
  AppBridge,
  extractConversationId,
  extractReplyText,
  type AppBridgeFailure,
  type AppBridgeInput,
} from './app-bridge';
export { parseAppSelector, resolveAppId, type AppSelector } from './app-selector';
