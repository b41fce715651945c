import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { AppError } from '../utils/AppError';
import { toChatRecipient } from '../utils/phoneNormalizer';
import type {
  ChatGateway,
  WaApiResponse,
  WaServiceResponse,
  WaButton,
  WaListSection,
} from '../types/whatsapp';

export interface WhatsAppOptions {
  apiVersion: string;
  phoneNumberId: string;
  accessToken: string;
  timeoutMs?: number;
}

interface MetaErrorBody {
  error?: {
    message?: string;
    type?: string;
    code?: number;
    error_subcode?: number;
    fbtrace_id?: string;
  };
}

function truncate(value: string, max: number): string {
  return value.length > max ? value.substring(0, max - 3) + '...' : value;
}

/**
 * WhatsAppService handles communication with WhatsApp Cloud API
 */
export class WhatsAppService implements ChatGateway {
  private readonly axiosInstance: AxiosInstance;

  constructor(private readonly options: WhatsAppOptions, axiosInstance?: AxiosInstance) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        baseURL: `https://graph.facebook.com/${options.apiVersion}/${options.phoneNumberId}`,
        timeout: options.timeoutMs ?? 15000,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  /**
   * Called before any API operation
   * @throws AppError if configuration is missing
   */
  private validateConfig(): void {
    if (!this.options.phoneNumberId || !this.options.accessToken) {
      throw new AppError(
        'WhatsApp credentials not configured. Set WA_PHONE_NUMBER_ID and WA_ACCESS_TOKEN',
        500
      );
    }
  }

  /**
   * Sends a request to the messages endpoint and extracts Meta error details
   */
  private async sendRequest(payload: Record<string, unknown>): Promise<WaApiResponse> {
    try {
      const response = await this.axiosInstance.post<WaApiResponse>('/messages', payload, {
        headers: {
          Authorization: `Bearer ${this.options.accessToken}`,
        },
      });

      return response.data;
    } catch (error) {
      if (axios.isAxiosError<MetaErrorBody>(error)) {
        const metaError = error.response?.data?.error;

        if (metaError) {
          const errorMessage = metaError.message || 'WhatsApp API error';
          const errorType = metaError.type || 'UNKNOWN';

          logger.error('WhatsApp API error details:', {
            code: metaError.code,
            type: errorType,
            message: errorMessage,
            subcode: metaError.error_subcode,
            fbtrace_id: metaError.fbtrace_id,
          });

          throw new AppError(`WhatsApp API error (${errorType}): ${errorMessage}`, 502);
        }
      }

      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new AppError(`WhatsApp API request failed: ${errorMessage}`, 502);
    }
  }

  private async sendMessage(
    to: string,
    description: string,
    message: Record<string, unknown>
  ): Promise<WaServiceResponse> {
    try {
      this.validateConfig();

      const normalizedTo = toChatRecipient(to);
      logger.info(`Sending WhatsApp ${description} to ${normalizedTo}`);

      const response = await this.sendRequest({
        messaging_product: 'whatsapp',
        to: normalizedTo,
        ...message,
      });

      const messageId = response.messages?.[0]?.id;
      if (!messageId) {
        throw new AppError('WhatsApp API returned no message ID', 502);
      }

      logger.info(`WhatsApp ${description} sent: messageId=${messageId}`);

      return { messageId };
    } catch (error) {
      logger.error(`Failed to send WhatsApp ${description} to ${to}:`, error);
      if (error instanceof AppError) {
        throw error;
      }
      throw new AppError(
        `Failed to send WhatsApp ${description}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        500
      );
    }
  }

  async sendText(to: string, body: string): Promise<WaServiceResponse> {
    return this.sendMessage(to, 'text', {
      type: 'text',
      text: { body },
    });
  }

  /**
   * Sends reply buttons (1 to 3, titles up to 20 chars)
   */
  async sendButtons(to: string, body: string, buttons: WaButton[]): Promise<WaServiceResponse> {
    if (buttons.length > 3) {
      throw new AppError('Maximum 3 buttons allowed', 500);
    }
    if (buttons.length === 0) {
      throw new AppError('At least one button is required', 500);
    }

    return this.sendMessage(to, 'buttons', {
      type: 'interactive',
      interactive: {
        type: 'button',
        body: { text: body },
        action: {
          buttons: buttons.map((btn) => ({
            type: 'reply',
            reply: {
              id: btn.id,
              title: truncate(btn.title, 20),
            },
          })),
        },
      },
    });
  }

  /**
   * Sends a selectable list (max 10 rows total across all sections)
   * Limits: section and row title 24 chars, description 72, button 20, row id 200
   */
  async sendList(
    to: string,
    body: string,
    buttonText: string,
    sections: WaListSection[]
  ): Promise<WaServiceResponse> {
    const totalRows = sections.reduce((sum, section) => sum + section.rows.length, 0);

    if (totalRows > 10) {
      throw new AppError(`Maximum 10 rows allowed across all sections. Found ${totalRows}`, 500);
    }
    if (totalRows === 0) {
      throw new AppError('At least one row is required', 500);
    }

    return this.sendMessage(to, 'list', {
      type: 'interactive',
      interactive: {
        type: 'list',
        body: { text: body },
        action: {
          button: truncate(buttonText, 20),
          sections: sections.map((section) => ({
            title: truncate(section.title, 24),
            rows: section.rows.map((row) => ({
              id: truncate(row.id, 200),
              title: truncate(row.title, 24),
              description: row.description ? truncate(row.description, 72) : '',
            })),
          })),
        },
      },
    });
  }

  /**
   * Marks a message as read; failures are logged only
   */
  async markAsRead(messageId: string): Promise<void> {
    if (!this.options.phoneNumberId || !this.options.accessToken) {
      logger.warn('Cannot mark message as read: WhatsApp credentials not configured');
      return;
    }

    try {
      await this.sendRequest({
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: messageId,
      });
      logger.debug(`WhatsApp message marked as read: messageId=${messageId}`);
    } catch (error) {
      logger.error(`Failed to mark WhatsApp message as read: messageId=${messageId}`, error);
    }
  }
}
