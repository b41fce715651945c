import express from 'express';
import logger from './config/logger';
import type { Container } from './container';
import { createWebhookRouter } from './routes/webhook.routes';
import { createWhatsAppRouter } from './routes/whatsapp.routes';

export function createApp(container: Container): express.Express {
  const app = express();

  // Mounted before the JSON parser: the payment signature covers the raw body
  app.use('/webhooks', createWebhookRouter(container.webhookController));

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/', createWhatsAppRouter(container.whatsappController)); // WhatsApp webhook at /webhook

  app.get('/', (req, res) => {
    res.json({
      service: 'Bar Order Bot API',
      status: 'running',
      endpoints: {
        health: '/health',
        whatsapp: {
          webhook: '/webhook (GET for verification, POST for messages)',
        },
        webhooks: {
          kopokopo: '/webhooks/kopokopo (POST)',
        },
      },
    });
  });

  // Health check endpoint with database and Redis checks
  app.get('/health', async (req, res) => {
    try {
      await container.db.raw('SELECT 1');
      if (container.redis) {
        await container.redis.ping();
      }

      res.json({
        status: 'ok',
        database: 'connected',
        redis: container.redis ? 'connected' : 'disabled',
        paymentQueue: container.dispatchQueue.size,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.error('Health check failed:', error);
      res.status(503).json({
        status: 'error',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return app;
}
