import logger from '../../config/logger';
import type { OrderRepository } from '../../repositories/types';
import type { Order } from '../../types/order';
import type { PaymentWebhookResult } from '../../types/payment';
import { OrderTransitionError } from '../../utils/AppError';
import { matchesHashedPhone } from '../../utils/phoneNormalizer';
import type { OrderLifecycleService } from '../order-lifecycle.service';
import { parseKopoKopoWebhook, verifyKopoKopoSignature } from './kopokopo.webhook';

/**
 * Resolves a payment callback to an order, or null to let the next matcher try
 */
export type OrderMatcher = (
  payment: PaymentWebhookResult,
  orders: OrderRepository,
  now: Date
) => Promise<Order | null>;

export const matchByOrderId: OrderMatcher = async (payment, orders) => {
  if (!payment.orderId) {
    return null;
  }
  return orders.getById(payment.orderId);
};

export const matchByPhoneAndAmount: OrderMatcher = async (payment, orders) => {
  if (!payment.senderPhone || payment.amount <= 0) {
    return null;
  }
  return orders.findPendingByPhoneAndAmount(payment.senderPhone, payment.amount);
};

export function matchByHashedPhoneAndAmount(windowMs: number): OrderMatcher {
  return async (payment, orders, now) => {
    if (!payment.hashedSenderPhone || payment.amount <= 0) {
      return null;
    }
    const since = new Date(now.getTime() - windowMs);
    const candidates = await orders.findRecentPendingByAmount(payment.amount, since);
    return (
      candidates.find((order) => matchesHashedPhone(order.customerPhone, payment.hashedSenderPhone)) ?? null
    );
  };
}

export interface PaymentReconcilerOptions {
  orders: OrderRepository;
  lifecycle: OrderLifecycleService;
  webhookSecret: string;
  hashedPhoneWindowMs?: number;
}

/**
 * PaymentReconciler turns Kopo Kopo callbacks into order transitions
 * Matchers run in order: order id, cleartext phone + amount, hashed phone + amount
 */
export class PaymentReconciler {
  private readonly matchers: OrderMatcher[];

  constructor(private readonly options: PaymentReconcilerOptions) {
    this.matchers = [
      matchByOrderId,
      matchByPhoneAndAmount,
      matchByHashedPhoneAndAmount(options.hashedPhoneWindowMs ?? 30 * 60 * 1000),
    ];
  }

  verifySignature(header: string | undefined, rawBody: string | Buffer): boolean {
    if (!this.options.webhookSecret) {
      logger.warn('KOPOKOPO_WEBHOOK_SECRET not set, payment webhook signature not checked');
    }
    return verifyKopoKopoSignature(this.options.webhookSecret, header, rawBody);
  }

  /**
   * Parses the callback and applies it
   * @throws AppError 400 for unparseable bodies; repository failures propagate
   */
  async processWebhook(rawBody: string | Buffer): Promise<PaymentWebhookResult> {
    const payment = parseKopoKopoWebhook(rawBody);

    logger.info('Payment webhook received:', {
      kind: payment.kind,
      orderId: payment.orderId,
      status: payment.status,
      reference: payment.reference,
      amount: payment.amount,
    });

    await this.apply(payment);
    return payment;
  }

  async resolveOrder(payment: PaymentWebhookResult, now: Date = new Date()): Promise<Order | null> {
    for (const matcher of this.matchers) {
      const order = await matcher(payment, this.options.orders, now);
      if (order) {
        return order;
      }
    }
    return null;
  }

  private async apply(payment: PaymentWebhookResult): Promise<void> {
    if (payment.outcome === 'pending') {
      logger.info(`Payment ${payment.reference || '(no reference)'} not final yet (status=${payment.status})`);
      return;
    }

    const order = await this.resolveOrder(payment);

    if (!order) {
      if (payment.success) {
        logger.warn('Orphaned payment: no pending order matches', {
          reference: payment.reference,
          amount: payment.amount,
          orderId: payment.orderId,
          hasSenderPhone: Boolean(payment.senderPhone),
          hasHashedPhone: Boolean(payment.hashedSenderPhone),
        });
      } else {
        logger.info(`Failed payment ${payment.reference || '(no reference)'} matches no order`);
      }
      return;
    }

    try {
      if (payment.success) {
        const result = await this.options.lifecycle.markPaid(order.id, payment.reference);
        if (!result.changed) {
          logger.info(`Duplicate payment callback for order ${order.id} ignored`);
        }
      } else {
        await this.options.lifecycle.markFailed(order.id, true);
      }
    } catch (error) {
      if (error instanceof OrderTransitionError) {
        logger.error(`Payment callback conflicts with order state: ${error.message}`, {
          reference: payment.reference,
          status: payment.status,
        });
        return;
      }
      throw error;
    }
  }
}
