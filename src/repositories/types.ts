import type { Order, OrderStatus, Product, StatusTransitionAudit, User } from '../types/order';

/**
 * Catalog reads used by the dialogue and inventory writes used by staff tools
 */
export interface ProductRepository {
  /** Active products grouped by category */
  getMenu(): Promise<Record<string, Product[]>>;
  getById(id: string): Promise<Product | null>;
  /** Case-insensitive substring match on active product names */
  search(query: string): Promise<Product[]>;
  updateStock(id: string, stockQuantity: number): Promise<Product | null>;
  updatePrice(id: string, price: number): Promise<Product | null>;
}

export interface OrderRepository {
  /** Persists the order and its items atomically */
  create(order: Order): Promise<Order>;
  getById(id: string): Promise<Order | null>;
  /**
   * Moves the order to `to` only while its status is one of `from`
   * @returns whether this call changed the row
   */
  transitionStatus(
    id: string,
    from: OrderStatus[],
    to: OrderStatus,
    audit?: StatusTransitionAudit
  ): Promise<boolean>;
  /** Newest PENDING order for the amount whose phone matches exactly or by last nine digits */
  findPendingByPhoneAndAmount(phone: string, amount: number): Promise<Order | null>;
  /** PENDING orders for the amount created after `since`, newest first */
  findRecentPendingByAmount(amount: number, since: Date): Promise<Order[]>;
}

export interface UserRepository {
  getOrCreateByPhone(phoneNumber: string, name?: string): Promise<User>;
}
