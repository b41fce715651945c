import { randomUUID } from 'crypto';
import type { Knex } from 'knex';
import logger from '../config/logger';
import { Order, OrderItem, OrderStatus, StatusTransitionAudit } from '../types/order';
import { lastNineDigits } from '../utils/phoneNormalizer';
import type { OrderRepository } from './types';

interface OrderRow {
  id: string;
  user_id: string;
  customer_phone: string;
  table_number: string;
  total_amount: string | number;
  status: string;
  payment_method: string;
  payment_reference: string;
  pickup_code: string;
  ready_at: Date | null;
  ready_by: string | null;
  completed_at: Date | null;
  completed_by: string | null;
  created_at: Date;
  updated_at: Date;
}

interface OrderItemRow {
  id: string;
  order_id: string;
  product_id: string;
  product_name: string;
  quantity: number;
  price_at_time: string | number;
}

function parseStatus(value: string): OrderStatus {
  for (const status of Object.values(OrderStatus)) {
    if (status === value) {
      return status;
    }
  }
  throw new Error(`Unknown order status in database: ${value}`);
}

function toOrderItem(row: OrderItemRow): OrderItem {
  return {
    productId: row.product_id,
    productName: row.product_name,
    quantity: row.quantity,
    priceAtTime: Number(row.price_at_time),
  };
}

function toOrder(row: OrderRow, items: OrderItemRow[]): Order {
  return {
    id: row.id,
    userId: row.user_id,
    customerPhone: row.customer_phone,
    tableNumber: row.table_number,
    totalAmount: Number(row.total_amount),
    status: parseStatus(row.status),
    paymentMethod: 'MPESA',
    paymentReference: row.payment_reference,
    pickupCode: row.pickup_code,
    items: items.map(toOrderItem),
    createdAt: row.created_at,
    readyAt: row.ready_at,
    readyBy: row.ready_by,
    completedAt: row.completed_at,
    completedBy: row.completed_by,
  };
}

/**
 * KnexOrderRepository persists orders and their line items in PostgreSQL
 * Status changes are conditional updates so concurrent callers cannot both win
 */
export class KnexOrderRepository implements OrderRepository {
  constructor(private readonly db: Knex) {}

  async create(order: Order): Promise<Order> {
    await this.db.transaction(async (trx) => {
      await trx<OrderRow>('orders').insert({
        id: order.id,
        user_id: order.userId,
        customer_phone: order.customerPhone,
        table_number: order.tableNumber,
        total_amount: order.totalAmount,
        status: order.status,
        payment_method: order.paymentMethod,
        payment_reference: order.paymentReference,
        pickup_code: order.pickupCode,
        created_at: order.createdAt,
        updated_at: order.createdAt,
      });

      if (order.items.length > 0) {
        await trx<OrderItemRow>('order_items').insert(
          order.items.map((item) => ({
            id: randomUUID(),
            order_id: order.id,
            product_id: item.productId,
            product_name: item.productName,
            quantity: item.quantity,
            price_at_time: item.priceAtTime,
          }))
        );
      }
    });

    logger.info(`Order created: id=${order.id}, total=${order.totalAmount}, items=${order.items.length}`);
    return order;
  }

  async getById(id: string): Promise<Order | null> {
    const row = await this.db<OrderRow>('orders').where({ id }).first();
    if (!row) {
      return null;
    }
    return this.withItems(row);
  }

  async transitionStatus(
    id: string,
    from: OrderStatus[],
    to: OrderStatus,
    audit: StatusTransitionAudit = {}
  ): Promise<boolean> {
    const at = audit.at ?? new Date();
    const patch: Partial<OrderRow> = { status: to, updated_at: at };

    if (audit.paymentReference) {
      patch.payment_reference = audit.paymentReference;
    }
    if (to === OrderStatus.READY) {
      patch.ready_at = at;
      patch.ready_by = audit.actorId ?? null;
    }
    if (to === OrderStatus.COMPLETED) {
      patch.completed_at = at;
      patch.completed_by = audit.actorId ?? null;
    }

    const updated = await this.db<OrderRow>('orders')
      .where('id', id)
      .whereIn('status', from)
      .update(patch);

    return updated > 0;
  }

  async findPendingByPhoneAndAmount(phone: string, amount: number): Promise<Order | null> {
    const tail = lastNineDigits(phone);

    const row = await this.db<OrderRow>('orders')
      .where({ status: OrderStatus.PENDING })
      .andWhere('total_amount', amount)
      .andWhere((qb) => {
        qb.where('customer_phone', phone);
        if (tail.length === 9) {
          qb.orWhere('customer_phone', 'like', `%${tail}`);
        }
      })
      .orderBy('created_at', 'desc')
      .first();

    return row ? this.withItems(row) : null;
  }

  async findRecentPendingByAmount(amount: number, since: Date): Promise<Order[]> {
    const rows = await this.db<OrderRow>('orders')
      .where({ status: OrderStatus.PENDING })
      .andWhere('total_amount', amount)
      .andWhere('created_at', '>', since)
      .orderBy('created_at', 'desc');

    return Promise.all(rows.map((row) => this.withItems(row)));
  }

  private async withItems(row: OrderRow): Promise<Order> {
    const items = await this.db<OrderItemRow>('order_items')
      .where({ order_id: row.id })
      .orderBy('product_name', 'asc');
    return toOrder(row, items);
  }
}
