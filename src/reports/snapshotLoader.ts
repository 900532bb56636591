/**
 * Snapshot Loader: reads the four record sets the in-memory aggregator needs.
 *
 * Only the columns the report uses are selected. Driver values are normalized:
 * BIGINT ids stay as strings, timestamps become Date instances, quantities
 * become numbers. NUMERIC line totals are passed through untouched so the
 * aggregator can sum them without float drift.
 */

import type { Knex } from 'knex';
import { ReportError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  CustomerRecord,
  DecimalValue,
  OrderItemRecord,
  OrderRecord,
  ProductRecord,
  RecordId,
  SalesSnapshot,
} from './types.js';

export interface SnapshotLoaderDeps {
  readonlyDb: Knex;
}

type Row = Record<string, unknown>;

function toRecordId(value: unknown): RecordId {
  return typeof value === 'number' ? value : String(value ?? '');
}

function toDecimal(value: unknown): DecimalValue {
  return typeof value === 'number' ? value : String(value ?? '0');
}

function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  return new Date(String(value));
}

export function normalizeOrder(row: Row): OrderRecord {
  return {
    order_id: toRecordId(row.order_id),
    customer_id: toRecordId(row.customer_id),
    shipping_country: String(row.shipping_country ?? ''),
    order_date: toDate(row.order_date),
  };
}

export function normalizeOrderItem(row: Row): OrderItemRecord {
  return {
    order_id: toRecordId(row.order_id),
    product_id: toRecordId(row.product_id),
    quantity: Number(row.quantity ?? 0),
    line_total: toDecimal(row.line_total),
  };
}

export function normalizeProduct(row: Row): ProductRecord {
  return {
    product_id: toRecordId(row.product_id),
    category: String(row.category ?? ''),
  };
}

export function normalizeCustomer(row: Row): CustomerRecord {
  return { customer_id: toRecordId(row.customer_id) };
}

function asRows(result: unknown, table: string): Row[] {
  if (!Array.isArray(result)) {
    throw new Error(`Unexpected result for ${table}: expected an array of rows`);
  }
  return result;
}

export function createSnapshotLoader(deps: SnapshotLoaderDeps) {
  const { readonlyDb } = deps;

  async function load(): Promise<SalesSnapshot> {
    const startTime = Date.now();
    logger.info('Snapshot loader: load start');

    try {
      const [orders, orderItems, products, customers] = await Promise.all([
        readonlyDb('orders').select('order_id', 'customer_id', 'shipping_country', 'order_date'),
        readonlyDb('order_items').select('order_id', 'product_id', 'quantity', 'line_total'),
        readonlyDb('products').select('product_id', 'category'),
        readonlyDb('customers').select('customer_id'),
      ]);

      const snapshot: SalesSnapshot = {
        orders: asRows(orders, 'orders').map(normalizeOrder),
        orderItems: asRows(orderItems, 'order_items').map(normalizeOrderItem),
        products: asRows(products, 'products').map(normalizeProduct),
        customers: asRows(customers, 'customers').map(normalizeCustomer),
      };

      const durationMs = Date.now() - startTime;
      logger.info(
        {
          durationMs,
          orders: snapshot.orders.length,
          orderItems: snapshot.orderItems.length,
          products: snapshot.products.length,
          customers: snapshot.customers.length,
        },
        'Snapshot loader: load completed',
      );
      return snapshot;
    } catch (err) {
      const durationMs = Date.now() - startTime;
      const cause = toError(err);
      logger.error({ durationMs, error: cause.message }, 'Snapshot loader: load failed');
      throw new ReportError('Failed to load sales snapshot', { cause });
    }
  }

  return { load };
}

export type SnapshotLoader = ReturnType<typeof createSnapshotLoader>;
