import { Router } from 'express';
import type { WhatsAppController } from '../controllers/whatsapp.controller';

/**
 * WhatsApp webhook endpoints
 * GET /webhook - Webhook verification (Meta requirement)
 * POST /webhook - Incoming messages and events
 */
export function createWhatsAppRouter(controller: WhatsAppController): Router {
  const router = Router();

  router.get('/webhook', (req, res) => controller.verifyWebhook(req, res));
  router.post('/webhook', (req, res) => controller.receiveWebhook(req, res));

  return router;
}
