/**
 * Top-up Assistant Bot
 * WhatsApp Cloud API webhook: verification handshake, signed deliveries, and the
 * classify -> dispatch -> reply loop for each inbound message.
 *
 * @module bot
 */

import { Hono } from 'hono';

import type { MessageLedger } from './db/messageStore';
import {
  GENERIC_ERROR_MESSAGE,
  TEXT_ONLY_MESSAGE,
  dispatchCommand,
  type AccountService,
  type HandlerContext,
  type OrderService,
} from './handlers';
import { log } from './logger';
import { normalizePhone, type IntentClassifier } from './parsing';
import {
  SIGNATURE_HEADER,
  parseWebhookPayload,
  verifySignature,
  type InboundMessage,
  type MessageSender,
} from './services/whatsapp';

// ============================================================================
// Options
// ============================================================================

/** A fixed classifier, or a getter so a reconfigured instance can be swapped in */
export type ClassifierSource = IntentClassifier | (() => IntentClassifier);

/** Bot configuration options */
export interface TopupBotOptions {
  classifier: ClassifierSource;
  sender: MessageSender;
  ledger: MessageLedger;
  accounts: AccountService;
  orders: OrderService;
  /** Token Meta echoes back during the webhook verification handshake */
  verifyToken: string;
  /** App secret for X-Hub-Signature-256; signature check is skipped when unset */
  appSecret?: string;
}

function resolveClassifier(source: ClassifierSource): IntentClassifier {
  return typeof source === 'function' ? source() : source;
}

// ============================================================================
// Message Handling
// ============================================================================

/** Sender in canonical form; WhatsApp already sends 234..., anything else passes through */
function canonicalSender(from: string): string {
  const result = normalizePhone(from);
  return result.success ? result.value : from;
}

async function sendReply(sender: MessageSender, to: string, body: string, messageId: string): Promise<void> {
  try {
    await sender.sendText(to, body);
  } catch (error) {
    log('error', 'Failed to send reply', { from: to, messageId, error });
  }
}

/**
 * Handle one inbound message: dedupe, mark read, classify, dispatch, reply.
 * Never throws; every failure is logged and, where possible, answered.
 */
async function handleInboundMessage(message: InboundMessage, options: TopupBotOptions): Promise<void> {
  const { sender, ledger } = options;
  const messageId = message.id;

  try {
    const claimed = await ledger.claim(messageId);
    if (!claimed) {
      log('info', 'Duplicate message skipped', { from: message.from, messageId });
      return;
    }
  } catch (error) {
    // Processing continues; a retried delivery may be answered twice
    log('error', 'Message ledger unavailable', { from: message.from, messageId, error });
  }

  try {
    await sender.markAsRead(messageId);
  } catch (error) {
    log('warn', 'Failed to mark message as read', { from: message.from, messageId, error });
  }

  if (message.text === null) {
    log('info', 'Non-text message received', { from: message.from, messageId, type: message.type });
    await sendReply(sender, message.from, TEXT_ONLY_MESSAGE, messageId);
    return;
  }

  const classifier = resolveClassifier(options.classifier);
  const command = classifier.classify(message.text);

  log('info', 'Message classified', {
    from: message.from,
    messageId,
    commandType: command.commandType,
    confidence: command.confidence,
    errorCode: command.parameters.error?.code,
  });

  const context: HandlerContext = {
    sender: canonicalSender(message.from),
    config: classifier.config,
    accounts: options.accounts,
    orders: options.orders,
  };

  let reply: string;
  try {
    reply = await dispatchCommand(command, context);
  } catch (error) {
    log('error', 'Error handling command', {
      from: message.from,
      messageId,
      commandType: command.commandType,
      error,
    });
    reply = GENERIC_ERROR_MESSAGE;
  }

  await sendReply(sender, message.from, reply, messageId);
}

// ============================================================================
// Bot Initialization
// ============================================================================

/**
 * Create the webhook app with all routes registered.
 *
 * @example
 * ```typescript
 * const app = createTopupBot({
 *   classifier: createIntentClassifier(),
 *   sender: new WhatsAppClient(config.whatsapp),
 *   ledger: new RedisMessageLedger(),
 *   accounts: backend,
 *   orders: backend,
 *   verifyToken: config.whatsapp.verifyToken,
 * });
 * serve({ fetch: app.fetch, port: 3000 });
 * ```
 */
export function createTopupBot(options: TopupBotOptions): Hono {
  const app = new Hono();

  app.get('/', (c) => c.text('Top-up assistant is up and running'));

  // Verification handshake when the webhook is registered
  app.get('/webhook', (c) => {
    const mode = c.req.query('hub.mode');
    const token = c.req.query('hub.verify_token');
    const challenge = c.req.query('hub.challenge');

    if (mode === 'subscribe' && token === options.verifyToken && challenge !== undefined) {
      log('info', 'Webhook verified');
      return c.text(challenge, 200);
    }

    log('warn', 'Webhook verification failed', { mode });
    return c.text('Forbidden', 403);
  });

  app.post('/webhook', async (c) => {
    const rawBody = await c.req.text();

    if (options.appSecret !== undefined) {
      const signature = c.req.header(SIGNATURE_HEADER);
      if (!verifySignature(rawBody, signature, options.appSecret)) {
        log('warn', 'Rejected webhook with invalid signature');
        return c.json({ error: 'Invalid signature' }, 401);
      }
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch (error) {
      log('warn', 'Rejected webhook with invalid JSON', { error });
      return c.json({ error: 'Invalid JSON' }, 400);
    }

    const delivery = parseWebhookPayload(payload);

    for (const status of delivery.statuses) {
      log('debug', 'Message status update', {
        messageId: status.id,
        status: status.status,
        recipientId: status.recipientId,
      });
    }

    for (const message of delivery.messages) {
      await handleInboundMessage(message, options);
    }

    return c.json({ status: 'received' });
  });

  log('info', 'Top-up bot routes registered');

  return app;
}
