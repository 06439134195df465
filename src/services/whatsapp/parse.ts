/**
 * Webhook Payload Parsing
 * Narrows the untyped webhook body (entry[].changes[].value) into messages and
 * status updates. Malformed entries are skipped.
 */

import type { InboundMessage, StatusUpdate, WebhookDelivery } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Text of a text message, or the title of a tapped button or list row */
function messageText(message: Record<string, unknown>): string | null {
  const { text, interactive, button } = message;

  if (isRecord(text)) {
    return asString(text.body) ?? null;
  }

  if (isRecord(interactive)) {
    const reply = isRecord(interactive.button_reply)
      ? interactive.button_reply
      : isRecord(interactive.list_reply)
        ? interactive.list_reply
        : undefined;
    return asString(reply?.title) ?? null;
  }

  // Quick-reply buttons on template messages
  if (isRecord(button)) {
    return asString(button.text) ?? null;
  }

  return null;
}

function parseMessage(value: unknown): InboundMessage | null {
  if (!isRecord(value)) return null;

  const id = asString(value.id);
  const from = asString(value.from);
  if (id === undefined || from === undefined) return null;

  return {
    id,
    from,
    type: asString(value.type) ?? 'unknown',
    text: messageText(value),
    timestamp: asString(value.timestamp),
  };
}

function parseStatus(value: unknown): StatusUpdate | null {
  if (!isRecord(value)) return null;

  const id = asString(value.id);
  const status = asString(value.status);
  if (id === undefined || status === undefined) return null;

  return { id, status, recipientId: asString(value.recipient_id) };
}

/**
 * Collect every message and status update in a webhook delivery.
 */
export function parseWebhookPayload(payload: unknown): WebhookDelivery {
  const delivery: WebhookDelivery = { messages: [], statuses: [] };
  if (!isRecord(payload)) return delivery;

  for (const entry of asArray(payload.entry)) {
    if (!isRecord(entry)) continue;

    for (const change of asArray(entry.changes)) {
      if (!isRecord(change) || !isRecord(change.value)) continue;

      for (const message of asArray(change.value.messages)) {
        const parsed = parseMessage(message);
        if (parsed) delivery.messages.push(parsed);
      }
      for (const status of asArray(change.value.statuses)) {
        const parsed = parseStatus(status);
        if (parsed) delivery.statuses.push(parsed);
      }
    }
  }

  return delivery;
}
