import logger from '../config/logger';
import { formatKes } from '../services/cart.service';
import type { InventoryService } from '../services/inventory.service';
import { completeButtonId, shortOrderId } from '../services/notification.service';
import type { OrderLifecycleService } from '../services/order-lifecycle.service';
import type { ChatGateway } from '../types/whatsapp';
import { AppError } from '../utils/AppError';
import { lastNineDigits } from '../utils/phoneNormalizer';

const STAFF_ACTION_PATTERN = /^(ready|complete)_(.+)$/;
// "stock <productId> <qty>" or "price <productId> <amount>"
const INVENTORY_COMMAND_PATTERN = /^(stock|price)\s+(\S+)\s+(\S+)$/i;

/**
 * StaffActionHandler applies "Mark Ready" / "Mark Collected" button taps and
 * stock/price commands from bar staff.
 * Messages from anyone else are left for the customer dialogue.
 */
export class StaffActionHandler {
  private readonly staff: Set<string>;

  constructor(
    private readonly lifecycle: OrderLifecycleService,
    private readonly inventory: InventoryService,
    private readonly chat: ChatGateway,
    staffPhones: string[]
  ) {
    this.staff = new Set(staffPhones.map(lastNineDigits).filter((digits) => digits.length === 9));
  }

  isStaff(phone: string): boolean {
    return this.staff.has(lastNineDigits(phone));
  }

  /**
   * @returns true when the message was a staff action and has been handled
   */
  async handle(phone: string, text: string): Promise<boolean> {
    const input = text.trim();
    const action = STAFF_ACTION_PATTERN.exec(input);
    const command = action ? null : INVENTORY_COMMAND_PATTERN.exec(input);
    if ((!action && !command) || !this.isStaff(phone)) {
      return false;
    }

    try {
      if (action) {
        await this.applyOrderAction(phone, action[1], action[2]);
      } else if (command) {
        await this.applyInventoryCommand(phone, command[1].toLowerCase(), command[2], command[3]);
      }
    } catch (error) {
      if (error instanceof AppError && error.statusCode < 500) {
        logger.warn(`Staff action rejected: ${error.message}`);
        await this.chat.sendText(phone, `⚠️ ${error.message}`);
        return true;
      }
      throw error;
    }

    return true;
  }

  private async applyOrderAction(phone: string, action: string, orderId: string): Promise<void> {
    logger.info(`Staff action ${action} on order ${orderId} by ${phone}`);

    if (action === 'ready') {
      const { order, changed } = await this.lifecycle.markReady(orderId, phone);
      if (changed) {
        await this.chat.sendButtons(
          phone,
          `✅ Order #${shortOrderId(order.id)} marked ready. Pickup code *${order.pickupCode}*.\n\n` +
            'Tap below once the customer collects it.',
          [{ id: completeButtonId(order.id), title: 'Mark Collected' }]
        );
      } else {
        await this.chat.sendText(phone, `ℹ️ Order #${shortOrderId(order.id)} is already marked ready.`);
      }
      return;
    }

    const { order, changed } = await this.lifecycle.markCompleted(orderId, phone);
    await this.chat.sendText(
      phone,
      changed
        ? `🎉 Order #${shortOrderId(order.id)} completed.`
        : `ℹ️ Order #${shortOrderId(order.id)} was already completed.`
    );
  }

  private async applyInventoryCommand(
    phone: string,
    command: string,
    productId: string,
    value: string
  ): Promise<void> {
    logger.info(`Staff ${command} update on ${productId} by ${phone}`);
    const amount = Number(value);

    if (command === 'stock') {
      const product = await this.inventory.updateStock(productId, amount);
      await this.chat.sendText(phone, `📦 ${product.name} stock set to ${product.stockQuantity}.`);
      return;
    }

    const product = await this.inventory.updatePrice(productId, amount);
    await this.chat.sendText(phone, `💰 ${product.name} price set to ${formatKes(product.price)}.`);
  }
}
