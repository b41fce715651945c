import logger from '../config/logger';
import type { ProductRepository } from '../repositories/types';
import type { Product } from '../types/order';
import { AppError } from '../utils/AppError';
import type { OperationsFeed } from './operations-feed';

/**
 * InventoryService applies staff stock and price edits and announces them on the feed
 */
export class InventoryService {
  constructor(
    private readonly products: ProductRepository,
    private readonly feed: OperationsFeed
  ) {}

  async updateStock(productId: string, stockQuantity: number): Promise<Product> {
    if (!Number.isInteger(stockQuantity) || stockQuantity < 0) {
      throw new AppError('Stock quantity must be a whole number of zero or more', 400);
    }

    const product = await this.products.updateStock(productId, stockQuantity);
    if (!product) {
      throw new AppError(`Product ${productId} not found`, 404);
    }

    logger.info(`Stock for ${product.name} set to ${stockQuantity}`);
    this.feed.publish({ type: 'stock_updated', data: { productId, stockQuantity } });
    return product;
  }

  async updatePrice(productId: string, price: number): Promise<Product> {
    if (!Number.isFinite(price) || price <= 0) {
      throw new AppError('Price must be greater than zero', 400);
    }

    const product = await this.products.updatePrice(productId, price);
    if (!product) {
      throw new AppError(`Product ${productId} not found`, 404);
    }

    logger.info(`Price for ${product.name} set to ${price}`);
    this.feed.publish({ type: 'price_updated', data: { productId, price } });
    return product;
  }
}
