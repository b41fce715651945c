import type { Order } from './order';

/**
 * Events published to the live operations feed
 */
export type OperationsEvent =
  | { type: 'new_order'; data: Order }
  | { type: 'order_ready'; data: Order }
  | { type: 'order_completed'; data: { orderId: string; completedBy: string | null } }
  | { type: 'stock_updated'; data: { productId: string; stockQuantity: number } }
  | { type: 'price_updated'; data: { productId: string; price: number } };

export type OperationsListener = (event: OperationsEvent) => void;
