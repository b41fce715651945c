import { Request, Response } from 'express';
import logger from '../config/logger';
import type { ConversationHandler } from '../handlers/conversation.handler';
import type { StaffActionHandler } from '../handlers/staff.handler';
import type { InboundMessage, WaMessage, WaWebhookPayload } from '../types/whatsapp';

export interface ReadReceipts {
  markAsRead(messageId: string): Promise<void>;
}

export interface WhatsAppControllerDeps {
  verifyToken: string;
  conversation: ConversationHandler;
  staff: StaffActionHandler;
  receipts: ReadReceipts;
}

/**
 * Text for text messages; the reply id for button and list replies
 */
function messageText(message: WaMessage): string | undefined {
  if (message.type === 'text') {
    return message.text?.body;
  }
  if (message.type === 'interactive' && message.interactive) {
    if (message.interactive.type === 'button_reply') {
      return message.interactive.button_reply?.id;
    }
    if (message.interactive.type === 'list_reply') {
      return message.interactive.list_reply?.id;
    }
  }
  if (message.type === 'button' && message.button) {
    return message.button.payload || message.button.text;
  }
  return undefined;
}

/**
 * Flattens a Meta webhook into the messages the bot acts on
 * Status updates and unsupported message types are skipped
 */
export function extractInboundMessages(payload: WaWebhookPayload): InboundMessage[] {
  const inbound: InboundMessage[] = [];

  if (!payload || !Array.isArray(payload.entry)) {
    return inbound;
  }

  for (const entry of payload.entry) {
    if (!Array.isArray(entry.changes)) {
      continue;
    }

    for (const change of entry.changes) {
      const value = change.value;
      if (!value || !Array.isArray(value.messages)) {
        continue;
      }

      for (const message of value.messages) {
        const text = messageText(message);
        if (text === undefined || !message.from) {
          logger.debug(`Skipping unsupported WhatsApp message type: ${message.type}`);
          continue;
        }

        const contact = value.contacts?.find((candidate) => candidate.wa_id === message.from);
        inbound.push({
          messageId: message.id,
          phone: message.from,
          text,
          messageType: message.type === 'text' ? 'text' : 'interactive',
          contactName: contact?.profile?.name,
        });
      }
    }
  }

  return inbound;
}

/**
 * WhatsAppController handles webhook verification and incoming messages
 */
export class WhatsAppController {
  constructor(private readonly deps: WhatsAppControllerDeps) {}

  /**
   * Verifies the webhook with Meta
   * GET /webhook?hub.mode=subscribe&hub.verify_token=...&hub.challenge=...
   */
  verifyWebhook(req: Request, res: Response): void {
    const mode = req.query['hub.mode'];
    const verifyToken = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    logger.info('Webhook verification attempt:', {
      mode,
      verifyToken: verifyToken ? '***' : 'missing',
      challenge: challenge ? 'present' : 'missing',
    });

    if (
      mode === 'subscribe' &&
      this.deps.verifyToken !== '' &&
      verifyToken === this.deps.verifyToken &&
      typeof challenge === 'string'
    ) {
      logger.info('Webhook verification: Success');
      res.status(200).send(challenge);
      return;
    }

    logger.warn('Webhook verification: Failed - Invalid token or mode');
    res.status(403).send('Forbidden');
  }

  /**
   * Receives incoming webhooks from Meta
   * POST /webhook answers 200 before any processing (Meta requirement)
   */
  receiveWebhook(req: Request, res: Response): void {
    res.status(200).send('OK');

    const messages = extractInboundMessages(req.body);
    if (messages.length === 0) {
      logger.debug('WhatsApp webhook: no messages (status update)');
      return;
    }

    this.processMessages(messages).catch((error) => {
      logger.error('WhatsApp webhook processing error:', error);
    });
  }

  /**
   * Messages in one webhook are handled in order so a sender's taps stay sequenced
   */
  async processMessages(messages: InboundMessage[]): Promise<void> {
    for (const message of messages) {
      logger.info('WhatsApp message received:', {
        messageId: message.messageId,
        from: message.phone,
        type: message.messageType,
        contactName: message.contactName,
      });

      this.deps.receipts.markAsRead(message.messageId).catch((error) => {
        logger.error('Failed to mark message as read:', error);
      });

      try {
        if (await this.deps.staff.handle(message.phone, message.text)) {
          continue;
        }
        await this.deps.conversation.handleIncomingMessage(message.phone, message.text, message.messageType);
      } catch (error) {
        logger.error(`Message ${message.messageId} from ${message.phone} failed:`, {
          error: error instanceof Error ? error.message : 'Unknown error',
          stack: error instanceof Error ? error.stack : undefined,
        });
      }
    }
  }
}
