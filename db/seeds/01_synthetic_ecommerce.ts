import type { Knex } from 'knex';
import { createSyntheticDataGenerator } from '../../src/data/syntheticDataGenerator.js';
import { logger } from '../../src/utils/logger.js';

const BATCH_SIZE = 1000;

function countFromEnv(key: string, defaultValue: number): number {
  const value = Number(process.env[key] ?? defaultValue);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer`);
  }
  return value;
}

async function insertInBatches<T extends object>(
  knex: Knex,
  table: string,
  rows: Iterable<T>,
): Promise<number> {
  let batch: T[] = [];
  let written = 0;

  for (const row of rows) {
    batch.push(row);
    if (batch.length >= BATCH_SIZE) {
      await knex(table).insert(batch);
      written += batch.length;
      batch = [];
    }
  }
  if (batch.length > 0) {
    await knex(table).insert(batch);
    written += batch.length;
  }

  logger.info({ table, rows: written }, 'Seeded table');
  return written;
}

export async function seed(knex: Knex): Promise<void> {
  const generator = createSyntheticDataGenerator({
    customers: countFromEnv('SEED_CUSTOMERS', 12_000),
    products: countFromEnv('SEED_PRODUCTS', 12_000),
    orders: countFromEnv('SEED_ORDERS', 20_000),
    seed: countFromEnv('SEED_RANDOM', 42),
  });

  await knex('order_items').del();
  await knex('orders').del();
  await knex('products').del();
  await knex('customers').del();

  await insertInBatches(knex, 'products', generator.products());
  await insertInBatches(knex, 'customers', generator.customers());
  await insertInBatches(knex, 'orders', generator.orders());
  await insertInBatches(knex, 'order_items', generator.orderItems());
}
