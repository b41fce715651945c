import type { Knex } from 'knex';
import logger from '../config/logger';
import type { Product } from '../types/order';
import type { ProductRepository } from './types';

interface ProductRow {
  id: string;
  name: string;
  description: string | null;
  price: string | number;
  category: string;
  stock_quantity: number;
  image_url: string | null;
  is_active: boolean;
  updated_at: Date;
}

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description || '',
    price: Number(row.price),
    category: row.category,
    stockQuantity: row.stock_quantity,
    imageUrl: row.image_url || '',
    isActive: row.is_active,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/**
 * KnexProductRepository reads the drinks catalog from PostgreSQL
 */
export class KnexProductRepository implements ProductRepository {
  constructor(private readonly db: Knex) {}

  async getMenu(): Promise<Record<string, Product[]>> {
    const rows = await this.db<ProductRow>('products')
      .where({ is_active: true })
      .orderBy([
        { column: 'category', order: 'asc' },
        { column: 'name', order: 'asc' },
      ]);

    const menu: Record<string, Product[]> = {};
    for (const row of rows) {
      const product = toProduct(row);
      (menu[product.category] ??= []).push(product);
    }
    return menu;
  }

  async getById(id: string): Promise<Product | null> {
    const row = await this.db<ProductRow>('products').where({ id }).first();
    return row ? toProduct(row) : null;
  }

  async search(query: string): Promise<Product[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }

    const rows = await this.db<ProductRow>('products')
      .where({ is_active: true })
      .whereRaw("LOWER(name) LIKE ? ESCAPE '\\'", [`%${escapeLike(needle)}%`])
      .orderBy('name', 'asc');

    return rows.map(toProduct);
  }

  async updateStock(id: string, stockQuantity: number): Promise<Product | null> {
    await this.db<ProductRow>('products')
      .where({ id })
      .update({ stock_quantity: stockQuantity, updated_at: new Date() });
    logger.info(`Stock updated: product=${id}, stock=${stockQuantity}`);
    return this.getById(id);
  }

  async updatePrice(id: string, price: number): Promise<Product | null> {
    await this.db<ProductRow>('products')
      .where({ id })
      .update({ price, updated_at: new Date() });
    logger.info(`Price updated: product=${id}, price=${price}`);
    return this.getById(id);
  }
}
