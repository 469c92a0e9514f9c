import type { WhatsAppWebhookPayload } from '@wa-relay/whatsapp-sdk';
import { z } from 'zod';

const optionalString = z.string().optional().catch(undefined);

const inboundMessageSchema = z
  .object({
    id: optionalString,
    from: optionalString,
    timestamp: optionalString,
    type: optionalString,
    text: z.object({ body: optionalString }).optional().catch(undefined),
  })
  .passthrough();

/** An array whose unusable elements become null instead of failing the array. */
function lenientArray<T extends z.ZodTypeAny>(element: T) {
  return z.array(element.nullable().catch(null)).optional().catch(undefined);
}

/**
 * Zod schema for the subset of the WhatsApp Cloud API webhook we read. Every
 * level is optional and a malformed element degrades to "absent" on its own,
 * so one odd message or entry never hides its siblings.
 */
const whatsAppWebhookPayloadSchema = z.object({
  object: optionalString,
  entry: lenientArray(
    z.object({
      id: optionalString,
      changes: lenientArray(
        z.object({
          field: optionalString,
          value: z
            .object({
              messaging_product: optionalString,
              metadata: z
                .object({
                  display_phone_number: optionalString,
                  phone_number_id: optionalString,
                })
                .optional()
                .catch(undefined),
              messages: lenientArray(inboundMessageSchema),
            })
            .optional()
            .catch(undefined),
        }),
      ),
    }),
  ),
});

/** True when the body is a non-empty object carrying an `entry` key. */
export function hasWebhookEntries(payload: unknown): payload is Record<string, unknown> {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    !Array.isArray(payload) &&
    Object.keys(payload).length > 0 &&
    'entry' in payload
  );
}

/**
 * Read the inbound body into a typed payload. Returns undefined only when the
 * body is not an object at all; malformed inner levels come back empty.
 */
export function parseWhatsAppWebhookPayload(payload: unknown): WhatsAppWebhookPayload | undefined {
  const result = whatsAppWebhookPayloadSchema.safeParse(payload);
  if (!result.success) {
    return undefined;
  }

  const { object, entry } = result.data;
  return {
    object,
    entry: entry?.filter(isPresent).map((item) => ({
      id: item.id,
      changes: item.changes?.filter(isPresent).map((change) => ({
        field: change.field,
        value: change.value && {
          messaging_product: change.value.messaging_product,
          metadata: change.value.metadata,
          messages: change.value.messages?.filter(isPresent),
        },
      })),
    })),
  };
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}
