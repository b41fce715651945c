/**
 * Catalog and order domain types
 */

export interface Product {
  id: string;
  name: string;
  description: string;
  price: number;
  category: string;
  stockQuantity: number;
  imageUrl: string;
  isActive: boolean;
}

export enum OrderStatus {
  PENDING = 'PENDING',
  PAID = 'PAID',
  READY = 'READY',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

export interface OrderItem {
  productId: string;
  productName: string;
  quantity: number;
  priceAtTime: number;
}

export interface Order {
  id: string;
  userId: string;
  /** Payment phone, used to correlate order-less payment callbacks */
  customerPhone: string;
  tableNumber: string;
  totalAmount: number;
  status: OrderStatus;
  paymentMethod: 'MPESA';
  paymentReference: string;
  pickupCode: string;
  items: OrderItem[];
  createdAt: Date;
  readyAt: Date | null;
  readyBy: string | null;
  completedAt: Date | null;
  completedBy: string | null;
}

export interface User {
  id: string;
  phoneNumber: string;
  name: string | null;
  createdAt: Date;
}

/**
 * Extra fields written together with a status change
 */
export interface StatusTransitionAudit {
  actorId?: string;
  paymentReference?: string;
  at?: Date;
}
