import express, { Router } from 'express';
import logger from '../config/logger';
import type { WebhookController } from '../controllers/webhook.controller';

/**
 * Payment provider webhooks
 * POST /webhooks/kopokopo - STK push and till payment results
 */
export function createWebhookRouter(controller: WebhookController): Router {
  const router = Router();

  router.post('/kopokopo', express.raw({ type: '*/*', limit: '1mb' }), (req, res) => {
    controller.handleKopoKopo(req, res).catch((error) => {
      logger.error('Unhandled webhook error:', error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal error' });
      }
    });
  });

  return router;
}
