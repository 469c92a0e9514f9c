import type { ConversationKey } from './store';

/** Scope a conversation to the receiving phone number and the WhatsApp sender. */
export function conversationKey(phoneNumberId: string, senderId: string): ConversationKey {
  return `whatsapp:${phoneNumberId}:${senderId}`;
}
