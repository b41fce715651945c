import type { Product } from '../types/order';
import type { CartItem } from '../types/session';

export function formatKes(amount: number): string {
  return `KES ${amount.toFixed(0)}`;
}

export function lineSubtotal(item: CartItem): number {
  return item.price * item.quantity;
}

export function cartTotal(cart: CartItem[]): number {
  return cart.reduce((sum, item) => sum + lineSubtotal(item), 0);
}

/**
 * Appends a line priced at the product's current price
 */
export function addToCart(cart: CartItem[], product: Product, quantity: number): CartItem[] {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new RangeError(`Cart quantity must be a positive integer, got ${quantity}`);
  }
  return [
    ...cart,
    {
      productId: product.id,
      quantity,
      name: product.name,
      price: product.price,
    },
  ];
}

export function formatCartLines(cart: CartItem[]): string {
  return cart
    .map((item) => `• ${item.name} x${item.quantity} = ${formatKes(lineSubtotal(item))}`)
    .join('\n');
}
