/**
 * In-memory trailing-window sales aggregation.
 *
 * Revenue, units, distinct orders and distinct customers per
 * (shipping_country, category) over orders in the trailing window, sorted by
 * revenue descending and capped at `limit`. Two formulations are provided:
 *
 * - aggregateSalesDirect: join every item to its order, product and customer,
 *   then drop rows outside the window.
 * - aggregateSalesPrefiltered: project the orders in the window into a keyed
 *   map first, then join the items against that projection.
 *
 * Both use inner-join semantics (an item whose order, product or customer is
 * missing contributes nothing) and return identical rows for the same input.
 */

import { createWindowFilter } from './trailingWindow.js';
import { resolveReportOptions, type ReportOptionsInput } from './reportOptions.js';
import type {
  DecimalValue,
  OrderRecord,
  RecordId,
  SalesAggregateRow,
  SalesSnapshot,
} from './types.js';

interface GroupAccumulator {
  shippingCountry: string;
  category: string;
  orderIds: Set<string>;
  customerIds: Set<string>;
  units: number;
  revenueMicros: number;
}

interface FinalizedGroup {
  row: SalesAggregateRow;
  revenueCents: number;
}

function idKey(id: RecordId): string {
  return String(id);
}

const MICROS_PER_UNIT = 1_000_000;
const MICROS_PER_CENT = 10_000;

// Six-decimal fixed point. Decimal strings are split at the point so the
// whole part is never scaled through a float.
function toMicros(value: DecimalValue): number {
  if (typeof value === 'number') {
    return Math.round(value * MICROS_PER_UNIT);
  }
  const match = /^\s*(-?)(\d*)(?:\.(\d*))?\s*$/.exec(value);
  if (!match) {
    return Math.round(parseFloat(value) * MICROS_PER_UNIT);
  }
  const [, sign, whole, fraction] = match;
  const micros =
    Number(whole || '0') * MICROS_PER_UNIT +
    Math.round(Number(`0.${fraction || '0'}`) * MICROS_PER_UNIT);
  return sign === '-' ? -micros : micros;
}

function indexById<T>(records: readonly T[], key: (record: T) => RecordId): Map<string, T> {
  const index = new Map<string, T>();
  for (const record of records) {
    index.set(idKey(key(record)), record);
  }
  return index;
}

function createGroupCollector() {
  const groups = new Map<string, GroupAccumulator>();

  function add(
    order: OrderRecord,
    category: string,
    quantity: number,
    lineTotal: DecimalValue,
  ): void {
    const key = `${order.shipping_country}\u0000${category}`;
    let group = groups.get(key);
    if (!group) {
      group = {
        shippingCountry: order.shipping_country,
        category,
        orderIds: new Set(),
        customerIds: new Set(),
        units: 0,
        revenueMicros: 0,
      };
      groups.set(key, group);
    }
    group.orderIds.add(idKey(order.order_id));
    group.customerIds.add(idKey(order.customer_id));
    group.units += quantity;
    group.revenueMicros += toMicros(lineTotal);
  }

  function finalize(limit: number): SalesAggregateRow[] {
    const finalized: FinalizedGroup[] = [];
    for (const group of groups.values()) {
      // Rounded once, after the whole group is summed.
      const revenueCents = Math.round(group.revenueMicros / MICROS_PER_CENT);
      finalized.push({
        revenueCents,
        row: {
          shipping_country: group.shippingCountry,
          category: group.category,
          orders: group.orderIds.size,
          units: group.units,
          revenue: revenueCents / 100,
          unique_customers: group.customerIds.size,
        },
      });
    }

    finalized.sort(compareGroups);
    return finalized.slice(0, limit).map((g) => g.row);
  }

  return { add, finalize };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Revenue descending, then shipping_country and category ascending. */
function compareGroups(a: FinalizedGroup, b: FinalizedGroup): number {
  if (a.revenueCents !== b.revenueCents) {
    return b.revenueCents - a.revenueCents;
  }
  return (
    compareText(a.row.shipping_country, b.row.shipping_country) ||
    compareText(a.row.category, b.row.category)
  );
}

export function aggregateSalesDirect(
  snapshot: SalesSnapshot,
  input: ReportOptionsInput = {},
): SalesAggregateRow[] {
  const { now, windowDays, limit, windowPolicy } = resolveReportOptions(input);
  const inWindow = createWindowFilter(now, windowDays, windowPolicy);

  const orders = indexById(snapshot.orders, (o) => o.order_id);
  const products = indexById(snapshot.products, (p) => p.product_id);
  const customers = indexById(snapshot.customers, (c) => c.customer_id);
  const collector = createGroupCollector();

  for (const item of snapshot.orderItems) {
    const order = orders.get(idKey(item.order_id));
    if (!order) continue;
    const product = products.get(idKey(item.product_id));
    if (!product) continue;
    if (!customers.has(idKey(order.customer_id))) continue;
    if (!inWindow(order.order_date)) continue;

    collector.add(order, product.category, item.quantity, item.line_total);
  }

  return collector.finalize(limit);
}

export function aggregateSalesPrefiltered(
  snapshot: SalesSnapshot,
  input: ReportOptionsInput = {},
): SalesAggregateRow[] {
  const { now, windowDays, limit, windowPolicy } = resolveReportOptions(input);
  const inWindow = createWindowFilter(now, windowDays, windowPolicy);

  const customers = indexById(snapshot.customers, (c) => c.customer_id);
  const recentOrders = new Map<string, OrderRecord>();
  for (const order of snapshot.orders) {
    if (inWindow(order.order_date) && customers.has(idKey(order.customer_id))) {
      recentOrders.set(idKey(order.order_id), order);
    }
  }
  if (recentOrders.size === 0) {
    return [];
  }

  const products = indexById(snapshot.products, (p) => p.product_id);
  const collector = createGroupCollector();

  for (const item of snapshot.orderItems) {
    const order = recentOrders.get(idKey(item.order_id));
    if (!order) continue;
    const product = products.get(idKey(item.product_id));
    if (!product) continue;

    collector.add(order, product.category, item.quantity, item.line_total);
  }

  return collector.finalize(limit);
}
