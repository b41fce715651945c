import logger from '../config/logger';
import type { ProductRepository } from '../repositories/types';
import type { Product } from '../types/order';
import { formatKes } from './cart.service';

export const CURATED_CATEGORY_ORDER = [
  'Cocktails',
  'Chasers',
  'Gin',
  'Whisky',
  'Spirits',
  'Vodka',
  'Brandy',
  'Rum',
  'Shots',
];

// WhatsApp list messages take at most 10 rows
export const MAX_MENU_CATEGORIES = 10;

function compareNames(a: string, b: string): number {
  return a.localeCompare(b, 'en', { sensitivity: 'base' });
}

/**
 * Curated categories first, the rest alphabetically, truncated to the list limit
 */
export function orderCategories(categories: Iterable<string>): string[] {
  const available = new Set(categories);
  const curated = CURATED_CATEGORY_ORDER.filter((category) => available.has(category));
  const rest = Array.from(available)
    .filter((category) => !CURATED_CATEGORY_ORDER.includes(category))
    .sort(compareNames);

  return [...curated, ...rest].slice(0, MAX_MENU_CATEGORIES);
}

export function sortProducts(products: Product[]): Product[] {
  return [...products].sort((a, b) => compareNames(a.name, b.name) || a.id.localeCompare(b.id));
}

export interface CatalogView {
  categories: string[];
  productsByCategory: Record<string, Product[]>;
}

export function buildCatalogView(menu: Record<string, Product[]>): CatalogView {
  const productsByCategory: Record<string, Product[]> = {};
  for (const [category, products] of Object.entries(menu)) {
    if (products.length > 0) {
      productsByCategory[category] = sortProducts(products);
    }
  }

  return {
    categories: orderCategories(Object.keys(productsByCategory)),
    productsByCategory,
  };
}

/**
 * Numbered product list; the index matches the alphabetical order used for selection
 */
export function renderProductList(title: string, products: Product[]): string {
  const lines = products.map(
    (product, index) => `${index + 1}. ${product.name} - ${formatKes(product.price)}`
  );
  return `${title}\n\n${lines.join('\n')}\n\nReply with the product name or number to add to cart.`;
}

/**
 * CatalogService gives the dialogue a consistently ordered view of active products
 */
export class CatalogService {
  constructor(private readonly products: ProductRepository) {}

  async getView(): Promise<CatalogView> {
    const menu = await this.products.getMenu();
    const view = buildCatalogView(menu);
    logger.debug(`Catalog view built: categories=${view.categories.length}`);
    return view;
  }

  async search(query: string): Promise<Product[]> {
    const results = await this.products.search(query);
    return sortProducts(results.filter((product) => product.isActive));
  }

  async getById(id: string): Promise<Product | null> {
    return this.products.getById(id);
  }
}
