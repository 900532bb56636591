import { describe, it, expect } from '@jest/globals';
import {
  CATALOG,
  COUNTRIES,
  createSyntheticDataGenerator,
  generateSyntheticDataset,
} from '../../../src/data/syntheticDataGenerator.js';

const NOW = new Date('2026-10-19T15:30:00.000Z');
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const OPTIONS = { customers: 40, products: 30, orders: 120, seed: 7, now: NOW, historyDays: 365 };

describe('generateSyntheticDataset', () => {
  const dataset = generateSyntheticDataset(OPTIONS);

  it('produces the requested number of rows per table', () => {
    expect(dataset.customers).toHaveLength(40);
    expect(dataset.products).toHaveLength(30);
    expect(dataset.orders).toHaveLength(120);
  });

  it('gives every order between one and six items', () => {
    const perOrder = new Map<number, number>();
    for (const item of dataset.orderItems) {
      perOrder.set(item.order_id, (perOrder.get(item.order_id) ?? 0) + 1);
    }
    expect(perOrder.size).toBe(120);
    for (const count of perOrder.values()) {
      expect(count).toBeGreaterThanOrEqual(1);
      expect(count).toBeLessThanOrEqual(6);
    }
  });

  it('numbers ids sequentially from 1', () => {
    expect(dataset.orders.map((o) => o.order_id)).toEqual(Array.from({ length: 120 }, (_, i) => i + 1));
    expect(dataset.orderItems.map((i) => i.order_item_id)).toEqual(
      Array.from({ length: dataset.orderItems.length }, (_, i) => i + 1),
    );
  });

  it('references existing customers and products', () => {
    for (const order of dataset.orders) {
      expect(order.customer_id).toBeGreaterThanOrEqual(1);
      expect(order.customer_id).toBeLessThanOrEqual(40);
    }
    for (const item of dataset.orderItems) {
      expect(item.product_id).toBeGreaterThanOrEqual(1);
      expect(item.product_id).toBeLessThanOrEqual(30);
    }
  });

  it('computes line totals from unit price and quantity', () => {
    for (const item of dataset.orderItems) {
      expect(item.quantity).toBeGreaterThanOrEqual(1);
      expect(item.quantity).toBeLessThanOrEqual(5);
      expect(item.unit_price).toBeGreaterThanOrEqual(1);
      expect(item.line_total).toBe(Math.round(item.unit_price * item.quantity * 100) / 100);
    }
  });

  it('spreads order dates over the history window', () => {
    const earliest = NOW.getTime() - 365 * MS_PER_DAY;
    for (const order of dataset.orders) {
      expect(order.order_date.getTime()).toBeGreaterThanOrEqual(earliest);
      expect(order.order_date.getTime()).toBeLessThanOrEqual(NOW.getTime());
    }
  });

  it('draws countries and categories from the fixed lists', () => {
    const countries: readonly string[] = COUNTRIES;
    const categories = CATALOG.map((entry) => entry.category);
    for (const order of dataset.orders) {
      expect(countries).toContain(order.shipping_country);
    }
    for (const product of dataset.products) {
      expect(categories).toContain(product.category);
      expect(product.cost).toBeLessThanOrEqual(product.price);
    }
  });

  it('is deterministic for a given seed', () => {
    expect(generateSyntheticDataset(OPTIONS)).toEqual(dataset);
  });

  it('changes with the seed', () => {
    const other = generateSyntheticDataset({ ...OPTIONS, seed: 8 });
    expect(other.orders).not.toEqual(dataset.orders);
  });
});

describe('createSyntheticDataGenerator', () => {
  it('yields rows lazily', () => {
    const generator = createSyntheticDataGenerator(OPTIONS);
    const products = generator.products();

    const first = products.next();

    expect(first.done).toBe(false);
    expect(first.value).toEqual(expect.objectContaining({ product_id: 1 }));
  });

  it('gives customers unique emails', () => {
    const generator = createSyntheticDataGenerator(OPTIONS);
    const emails = [...generator.customers()].map((c) => c.email);

    expect(new Set(emails).size).toBe(emails.length);
  });
});
