import { Request, Response } from 'express';
import logger from '../config/logger';
import { KOPOKOPO_SIGNATURE_HEADER } from '../services/payment';
import type { PaymentReconciler } from '../services/payment';
import { AppError } from '../utils/AppError';

/**
 * WebhookController handles payment provider webhooks
 */
export class WebhookController {
  constructor(private readonly reconciler: PaymentReconciler) {}

  /**
   * Handles Kopo Kopo incoming payment and till notifications
   * POST /webhooks/kopokopo with the body left raw for the signature check
   */
  async handleKopoKopo(req: Request, res: Response): Promise<void> {
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    if (!this.reconciler.verifySignature(req.get(KOPOKOPO_SIGNATURE_HEADER), rawBody)) {
      logger.warn('Kopo Kopo webhook rejected: invalid signature');
      res.status(401).json({ error: 'Invalid signature' });
      return;
    }

    try {
      const payment = await this.reconciler.processWebhook(rawBody);
      res.status(200).json({ status: 'ok', outcome: payment.outcome });
    } catch (error) {
      if (error instanceof AppError && error.statusCode < 500) {
        logger.warn(`Kopo Kopo webhook rejected: ${error.message}`);
        res.status(error.statusCode).json({ error: error.message });
        return;
      }

      // 500 makes the provider retry once the database is back
      logger.error('Kopo Kopo webhook error:', {
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
      });
      res.status(500).json({ error: 'Internal error' });
    }
  }
}
