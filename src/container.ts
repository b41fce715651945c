import type Redis from 'ioredis';
import type { Knex } from 'knex';
import { createDatabase } from './config/database';
import { AppConfig, config as defaultConfig } from './config/env';
import logger from './config/logger';
import { createRedisClient } from './config/redis';
import { WebhookController } from './controllers/webhook.controller';
import { WhatsAppController } from './controllers/whatsapp.controller';
import { ConversationHandler } from './handlers/conversation.handler';
import { StaffActionHandler } from './handlers/staff.handler';
import { KnexOrderRepository } from './repositories/order.repository';
import { KnexProductRepository } from './repositories/product.repository';
import { KnexUserRepository } from './repositories/user.repository';
import { CatalogService } from './services/catalog.service';
import { FollowUpScheduler } from './services/followup.scheduler';
import { InventoryService } from './services/inventory.service';
import { OrderNotificationService } from './services/notification.service';
import { OperationsFeed } from './services/operations-feed';
import { OrderLifecycleService } from './services/order-lifecycle.service';
import { KopoKopoService, PaymentDispatchQueue, PaymentReconciler } from './services/payment';
import { InMemorySessionStore, RedisSessionStore, SessionStore } from './services/session.service';
import { WhatsAppService } from './services/whatsapp.service';

/**
 * `feed` and `inventory` are also exposed for an operations dashboard to attach to
 */
export interface Container {
  db: Knex;
  redis: Redis | null;
  sessions: SessionStore;
  feed: OperationsFeed;
  inventory: InventoryService;
  dispatchQueue: PaymentDispatchQueue;
  followUps: FollowUpScheduler;
  whatsappController: WhatsAppController;
  webhookController: WebhookController;
}

/**
 * Builds the object graph from configuration
 */
export function createContainer(config: AppConfig = defaultConfig): Container {
  const db = createDatabase(config.databaseUrl);
  const redis = createRedisClient(config.redisUrl);

  const sessions: SessionStore = redis
    ? new RedisSessionStore(redis, config.sessionTtlSeconds)
    : new InMemorySessionStore(config.sessionTtlSeconds);

  const products = new KnexProductRepository(db);
  const orders = new KnexOrderRepository(db);
  const users = new KnexUserRepository(db);

  const whatsapp = new WhatsAppService(config.whatsapp);
  const feed = new OperationsFeed();
  feed.subscribe((event) => logger.info(`Operations event: ${event.type}`));
  const inventory = new InventoryService(products, feed);
  const notifier = new OrderNotificationService(whatsapp, feed, config.barStaffPhones);
  const lifecycle = new OrderLifecycleService(orders, notifier);

  const dispatchQueue = new PaymentDispatchQueue(new KopoKopoService(config.kopokopo), {
    intervalMs: config.payments.dispatchIntervalMs,
    capacity: config.payments.queueCapacity,
    dedupWindowMs: config.payments.dedupWindowMs,
  });
  const followUps = new FollowUpScheduler(config.payments.followUpDelayMs);

  const conversation = new ConversationHandler({
    sessions,
    catalog: new CatalogService(products),
    orders,
    users,
    chat: whatsapp,
    dispatcher: dispatchQueue,
    lifecycle,
    followUps,
    barName: config.barName,
  });

  const reconciler = new PaymentReconciler({
    orders,
    lifecycle,
    webhookSecret: config.kopokopo.webhookSecret,
    hashedPhoneWindowMs: config.payments.hashedPhoneWindowMs,
  });

  if (config.barStaffPhones.length === 0) {
    logger.warn('BAR_STAFF_PHONES not set. Paid orders will not be announced to staff.');
  }

  return {
    db,
    redis,
    sessions,
    feed,
    inventory,
    dispatchQueue,
    followUps,
    whatsappController: new WhatsAppController({
      verifyToken: config.whatsapp.verifyToken,
      conversation,
      staff: new StaffActionHandler(lifecycle, inventory, whatsapp, config.barStaffPhones),
      receipts: whatsapp,
    }),
    webhookController: new WebhookController(reconciler),
  };
}

/**
 * Stops timers and closes connections; safe to call once at exit
 */
export async function disposeContainer(container: Container): Promise<void> {
  container.dispatchQueue.stop();
  container.followUps.cancelAll();

  if (container.redis) {
    await container.redis.quit().catch((error: unknown) => {
      logger.warn('Redis quit failed:', error instanceof Error ? error.message : 'Unknown error');
    });
  }
  await container.db.destroy();
}
