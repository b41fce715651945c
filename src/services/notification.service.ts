import logger from '../config/logger';
import type { Order } from '../types/order';
import type { ChatGateway } from '../types/whatsapp';
import { formatKes } from './cart.service';
import type { OperationsFeed } from './operations-feed';

export function shortOrderId(orderId: string): string {
  return orderId.slice(0, 8);
}

export function readyButtonId(orderId: string): string {
  return `ready_${orderId}`;
}

export function completeButtonId(orderId: string): string {
  return `complete_${orderId}`;
}

/**
 * OrderNotificationService tells customers, bar staff and the operations feed
 * about order transitions. Send failures are logged, never thrown.
 */
export class OrderNotificationService {
  constructor(
    private readonly chat: ChatGateway,
    private readonly feed: OperationsFeed,
    private readonly staffPhones: string[]
  ) {}

  async paymentReceived(order: Order): Promise<void> {
    const customerMessage =
      `✅ *Payment received!*\n\n` +
      `Order #${shortOrderId(order.id)}\n` +
      `Total: ${formatKes(order.totalAmount)}\n\n` +
      `Your pickup code is *${order.pickupCode}*. Show it at the bar to collect your drinks.`;

    const items = order.items.map((item) => `• ${item.quantity} x ${item.productName}`).join('\n');
    const staffMessage =
      `🔔 *New paid order* #${shortOrderId(order.id)}\n` +
      `Pickup code: *${order.pickupCode}*\n\n` +
      `${items}\n\n` +
      `Total: ${formatKes(order.totalAmount)}`;

    await this.deliver(`payment received for ${order.id}`, [
      () => this.chat.sendText(order.customerPhone, customerMessage),
      ...this.staffPhones.map(
        (phone) => () =>
          this.chat.sendButtons(phone, staffMessage, [
            { id: readyButtonId(order.id), title: 'Mark Ready' },
          ])
      ),
    ]);

    this.feed.publish({ type: 'new_order', data: order });
  }

  async paymentFailed(order: Order): Promise<void> {
    await this.deliver(`payment failed for ${order.id}`, [
      () =>
        this.chat.sendText(
          order.customerPhone,
          `❌ Payment failed for order #${shortOrderId(order.id)}. Type 'menu' to try again.`
        ),
    ]);
  }

  async orderReady(order: Order): Promise<void> {
    await this.deliver(`order ready for ${order.id}`, [
      () =>
        this.chat.sendText(
          order.customerPhone,
          `🍸 *Order Ready!*\n\nYour order #${shortOrderId(order.id)} is ready. ` +
            `Show pickup code *${order.pickupCode}* at the bar.`
        ),
    ]);

    this.feed.publish({ type: 'order_ready', data: order });
  }

  async orderCompleted(order: Order): Promise<void> {
    this.feed.publish({
      type: 'order_completed',
      data: { orderId: order.id, completedBy: order.completedBy },
    });
  }

  private async deliver(context: string, sends: Array<() => Promise<unknown>>): Promise<void> {
    const results = await Promise.allSettled(sends.map((send) => send()));
    results.forEach((result) => {
      if (result.status === 'rejected') {
        logger.error(`Notification failed (${context}):`, result.reason);
      }
    });
  }
}
