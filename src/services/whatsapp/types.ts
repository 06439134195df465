/**
 * WhatsApp Cloud API Types
 * Only the parts of the webhook and send payloads the bot uses.
 */

/** Inbound user message, reduced to what the bot needs */
export interface InboundMessage {
  id: string;
  /** Sender phone number as WhatsApp reports it (digits, country code first) */
  from: string;
  /** WhatsApp message type: text, interactive, image, audio, ... */
  type: string;
  /** Message text; interactive replies carry their title. Null for media and other types. */
  text: string | null;
  timestamp?: string;
}

/** Delivery status for a message the bot sent */
export interface StatusUpdate {
  id: string;
  status: string;
  recipientId?: string;
}

export interface WebhookDelivery {
  messages: InboundMessage[];
  statuses: StatusUpdate[];
}

/** Outbound channel used by the webhook; implemented by WhatsAppClient */
export interface MessageSender {
  sendText(to: string, body: string): Promise<void>;
  markAsRead(messageId: string): Promise<void>;
}
