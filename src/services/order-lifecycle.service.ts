import logger from '../config/logger';
import type { OrderRepository } from '../repositories/types';
import { Order, OrderStatus, StatusTransitionAudit } from '../types/order';
import { AppError, OrderTransitionError } from '../utils/AppError';
import type { OrderNotificationService } from './notification.service';

const ALLOWED_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  [OrderStatus.PENDING]: [OrderStatus.PAID, OrderStatus.FAILED],
  [OrderStatus.PAID]: [OrderStatus.READY],
  [OrderStatus.READY]: [OrderStatus.COMPLETED],
  [OrderStatus.COMPLETED]: [],
  [OrderStatus.FAILED]: [],
};

export interface TransitionResult {
  order: Order;
  /** false when the order was already in the target status */
  changed: boolean;
}

/**
 * OrderLifecycleService moves orders along PENDING → PAID → READY → COMPLETED (or FAILED)
 *
 * Re-applying the current status is a no-op success, so duplicate webhooks and
 * double-tapped staff buttons notify once. Updates are conditional on the prior
 * status, which keeps concurrent callers from both winning.
 */
export class OrderLifecycleService {
  constructor(
    private readonly orders: OrderRepository,
    private readonly notifier: OrderNotificationService
  ) {}

  async transition(
    orderId: string,
    to: OrderStatus,
    audit: StatusTransitionAudit = {}
  ): Promise<TransitionResult> {
    const order = await this.loadOrder(orderId);

    if (order.status === to) {
      return { order, changed: false };
    }
    if (!ALLOWED_TRANSITIONS[order.status].includes(to)) {
      throw new OrderTransitionError(orderId, order.status, to);
    }

    const changed = await this.orders.transitionStatus(orderId, [order.status], to, audit);
    const current = await this.loadOrder(orderId);

    if (changed) {
      logger.info(`Order ${orderId}: ${order.status} -> ${to}`, { actor: audit.actorId });
      return { order: current, changed: true };
    }

    // Lost a race; fine if the winner moved it to the same place
    if (current.status === to) {
      return { order: current, changed: false };
    }
    throw new OrderTransitionError(orderId, current.status, to);
  }

  async markPaid(orderId: string, paymentReference: string): Promise<TransitionResult> {
    const result = await this.transition(orderId, OrderStatus.PAID, { paymentReference });
    if (result.changed) {
      await this.notifier.paymentReceived(result.order);
    }
    return result;
  }

  /**
   * @param notifyCustomer - false when the caller tells the customer itself
   */
  async markFailed(orderId: string, notifyCustomer: boolean): Promise<TransitionResult> {
    const result = await this.transition(orderId, OrderStatus.FAILED);
    if (result.changed && notifyCustomer) {
      await this.notifier.paymentFailed(result.order);
    }
    return result;
  }

  async markReady(orderId: string, actorId: string): Promise<TransitionResult> {
    const result = await this.transition(orderId, OrderStatus.READY, { actorId });
    if (result.changed) {
      await this.notifier.orderReady(result.order);
    }
    return result;
  }

  async markCompleted(orderId: string, actorId: string): Promise<TransitionResult> {
    const result = await this.transition(orderId, OrderStatus.COMPLETED, { actorId });
    if (result.changed) {
      await this.notifier.orderCompleted(result.order);
    }
    return result;
  }

  private async loadOrder(orderId: string): Promise<Order> {
    const order = await this.orders.getById(orderId);
    if (!order) {
      throw new AppError(`Order ${orderId} not found`, 404);
    }
    return order;
  }
}
