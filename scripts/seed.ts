import { readFileSync } from 'fs';
import path from 'path';
import { createDatabase } from '../src/config/database';

interface SeedProduct {
  id: string;
  name: string;
  description: string;
  price: number;
  category: string;
  stockQuantity: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toSeedProduct(value: unknown, index: number): SeedProduct {
  if (
    !isRecord(value) ||
    typeof value.id !== 'string' ||
    typeof value.name !== 'string' ||
    typeof value.price !== 'number' ||
    typeof value.category !== 'string' ||
    typeof value.stockQuantity !== 'number'
  ) {
    throw new Error(`Invalid product at index ${index} in seed file`);
  }
  return {
    id: value.id,
    name: value.name,
    description: typeof value.description === 'string' ? value.description : '',
    price: value.price,
    category: value.category,
    stockQuantity: value.stockQuantity,
  };
}

/**
 * Upserts the drinks catalog from db/seed-products.json
 * Re-running refreshes names, prices and categories and resets stock
 */
async function main() {
  const raw: unknown = JSON.parse(
    readFileSync(path.resolve(__dirname, '../db/seed-products.json'), 'utf8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('Seed file must contain an array of products');
  }
  const products = raw.map(toSeedProduct);

  const db = createDatabase();
  console.log(`🌱 Seeding ${products.length} products...`);

  try {
    const now = new Date();
    await db('products')
      .insert(
        products.map((product) => ({
          id: product.id,
          name: product.name,
          description: product.description,
          price: product.price,
          category: product.category,
          stock_quantity: product.stockQuantity,
          is_active: true,
          updated_at: now,
        }))
      )
      .onConflict('id')
      .merge(['name', 'description', 'price', 'category', 'stock_quantity', 'is_active', 'updated_at']);

    const categories = new Set(products.map((product) => product.category));
    console.log(`✅ Seeded ${products.length} products across ${categories.size} categories`);
  } finally {
    await db.destroy();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Seed failed:', error);
  process.exit(1);
});
