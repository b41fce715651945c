import { describe, it, expect } from 'vitest';
import {
  CatalogService,
  buildCatalogView,
  orderCategories,
  renderProductList,
  sortProducts,
} from './catalog.service';
import { InMemoryProductRepository, makeProduct } from '../test/fakes';

describe('orderCategories', () => {
  it('puts curated categories first, then the rest alphabetically', () => {
    expect(orderCategories(['Wine', 'Gin', 'Beer', 'Cocktails', 'Rum'])).toEqual([
      'Cocktails',
      'Gin',
      'Rum',
      'Beer',
      'Wine',
    ]);
  });

  it('truncates to ten categories', () => {
    const categories = [
      'Cocktails', 'Chasers', 'Gin', 'Whisky', 'Spirits', 'Vodka',
      'Brandy', 'Rum', 'Shots', 'Wine', 'Beer', 'Cider',
    ];
    expect(orderCategories(categories)).toEqual([
      'Cocktails', 'Chasers', 'Gin', 'Whisky', 'Spirits', 'Vodka',
      'Brandy', 'Rum', 'Shots', 'Beer',
    ]);
  });
});

describe('sortProducts', () => {
  it('orders by name regardless of case or insertion order', () => {
    const sorted = sortProducts([
      makeProduct({ id: '1', name: 'tanqueray', category: 'Gin' }),
      makeProduct({ id: '2', name: 'Beefeater', category: 'Gin' }),
      makeProduct({ id: '3', name: 'Gordons', category: 'Gin' }),
    ]);
    expect(sorted.map((product) => product.name)).toEqual(['Beefeater', 'Gordons', 'tanqueray']);
  });
});

describe('buildCatalogView', () => {
  it('drops empty categories and sorts each category', () => {
    const view = buildCatalogView({
      Gin: [
        makeProduct({ id: 'g2', name: 'Tanqueray', category: 'Gin' }),
        makeProduct({ id: 'g1', name: 'Beefeater', category: 'Gin' }),
      ],
      Vodka: [],
    });
    expect(view.categories).toEqual(['Gin']);
    expect(view.productsByCategory.Gin.map((product) => product.id)).toEqual(['g1', 'g2']);
  });
});

describe('renderProductList', () => {
  it('numbers products with their price', () => {
    const text = renderProductList('*Gin*', [
      makeProduct({ id: 'g1', name: 'Beefeater', category: 'Gin', price: 450 }),
      makeProduct({ id: 'g2', name: 'Tanqueray', category: 'Gin', price: 600 }),
    ]);
    expect(text).toBe(
      '*Gin*\n\n1. Beefeater - KES 450\n2. Tanqueray - KES 600\n\nReply with the product name or number to add to cart.'
    );
  });
});

describe('CatalogService', () => {
  it('searches active products only, alphabetically', async () => {
    const catalog = new CatalogService(
      new InMemoryProductRepository([
        makeProduct({ id: 'a', name: 'Smirnoff Ice', category: 'Vodka' }),
        makeProduct({ id: 'b', name: 'Ice Cold Tusker', category: 'Beer' }),
        makeProduct({ id: 'c', name: 'Iced Tea', category: 'Chasers', isActive: false }),
      ])
    );
    const results = await catalog.search('ICE');
    expect(results.map((product) => product.id)).toEqual(['b', 'a']);
  });
});
