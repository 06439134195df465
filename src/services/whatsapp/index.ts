export { WhatsAppClient, WhatsAppApiError, MAX_TEXT_LENGTH, type WhatsAppClientOptions } from './client';
export { parseWebhookPayload } from './parse';
export { SIGNATURE_HEADER, computeSignature, verifySignature } from './signature';
export type { InboundMessage, StatusUpdate, WebhookDelivery, MessageSender } from './types';
