/**
 * WhatsApp Cloud API Client
 * Sends text replies and read receipts through the Graph API messages endpoint.
 */

import type { WhatsAppConfig } from '../../config';
import type { MessageSender } from './types';

const GRAPH_API_BASE = 'https://graph.facebook.com';

/** WhatsApp caps text bodies at 4096 characters */
export const MAX_TEXT_LENGTH = 4096;

export class WhatsAppApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`WhatsApp API error (${status}): ${body}`);
    this.name = 'WhatsAppApiError';
    this.status = status;
    this.body = body;
  }
}

export type WhatsAppClientOptions = Pick<WhatsAppConfig, 'accessToken' | 'phoneNumberId' | 'apiVersion'>;

export class WhatsAppClient implements MessageSender {
  private readonly endpoint: string;
  private readonly accessToken: string;

  constructor(options: WhatsAppClientOptions) {
    this.endpoint = `${GRAPH_API_BASE}/${options.apiVersion}/${options.phoneNumberId}/messages`;
    this.accessToken = options.accessToken;
  }

  async sendText(to: string, body: string): Promise<void> {
    await this.post({
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to,
      type: 'text',
      text: { preview_url: false, body: body.slice(0, MAX_TEXT_LENGTH) },
    });
  }

  async markAsRead(messageId: string): Promise<void> {
    await this.post({
      messaging_product: 'whatsapp',
      status: 'read',
      message_id: messageId,
    });
  }

  private async post(payload: Record<string, unknown>): Promise<void> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new WhatsAppApiError(response.status, errorText);
    }
  }
}
