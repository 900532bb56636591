/**
 * Sales Report Queries: the trailing-window sales report as parameterized SQL.
 *
 * Two formulations of the same aggregation:
 * - salesByCountryCategory: orders ⋈ order_items ⋈ products ⋈ customers, filtered by the window
 * - salesByCountryCategoryPrefiltered: the window is applied inside a CTE over orders first
 *
 * All queries:
 * - Bind `now` and the window length as parameters (no string concatenation)
 * - Round revenue to 2 decimal places
 * - Break revenue ties by shipping_country, then category, in byte order
 * - Run on the read-only database connection (session time zone UTC)
 */

import type { Knex } from 'knex';
import { ReportError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { resolveReportOptions, type ReportOptionsInput } from './reportOptions.js';
import type { SalesAggregateRow, SalesReportOptions, WindowPolicy } from './types.js';

export interface SalesReportQueryDeps {
  readonlyDb: Knex;
}

const AGGREGATE_ORDER_BY =
  'revenue DESC, shipping_country COLLATE "C" ASC, category COLLATE "C" ASC';

/**
 * SQL predicate placing `column` inside the trailing window.
 * Expects two bindings: the ISO timestamp of `now`, then the window length in days.
 */
export function windowPredicate(column: string, policy: WindowPolicy): string {
  switch (policy) {
    case 'calendar_day':
      return `CAST(${column} AS date) >= CAST(CAST(? AS timestamptz) - CAST(? AS integer) * INTERVAL '1 day' AS date)`;
    case 'current_date':
      return `${column} >= CAST(CAST(? AS timestamptz) AS date) - CAST(? AS integer) * INTERVAL '1 day'`;
  }
}

function windowBindings(options: SalesReportOptions): [string, number] {
  return [options.now.toISOString(), options.windowDays];
}

function parseCount(value: unknown): number {
  return parseInt(String(value ?? '0'), 10) || 0;
}

export function parseAggregateRow(row: Record<string, unknown>): SalesAggregateRow {
  return {
    shipping_country: String(row.shipping_country ?? ''),
    category: String(row.category ?? ''),
    orders: parseCount(row.orders),
    units: parseCount(row.units),
    revenue: Math.round((parseFloat(String(row.revenue ?? '0')) || 0) * 100) / 100,
    unique_customers: parseCount(row.unique_customers),
  };
}

export function createSalesReportQueries(deps: SalesReportQueryDeps) {
  const { readonlyDb } = deps;

  function aggregateColumns(orderAlias: string, itemAlias: string) {
    return [
      `${orderAlias}.shipping_country`,
      'p.category',
      readonlyDb.raw(`COUNT(DISTINCT ${orderAlias}.order_id) AS orders`),
      readonlyDb.raw(`COALESCE(SUM(${itemAlias}.quantity), 0) AS units`),
      readonlyDb.raw(`ROUND(SUM(${itemAlias}.line_total), 2) AS revenue`),
      readonlyDb.raw(`COUNT(DISTINCT ${orderAlias}.customer_id) AS unique_customers`),
    ];
  }

  async function run(
    name: string,
    options: SalesReportOptions,
    build: () => PromiseLike<unknown>,
  ): Promise<SalesAggregateRow[]> {
    const { now, windowDays, limit, windowPolicy } = options;
    const logContext = { now: now.toISOString(), windowDays, limit, windowPolicy };

    const startTime = Date.now();
    logger.info(logContext, `Sales report query: ${name} start`);

    try {
      const rows = await build();
      if (!Array.isArray(rows)) {
        throw new Error('Unexpected query result: expected an array of rows');
      }
      const result = rows.map(parseAggregateRow);
      const durationMs = Date.now() - startTime;

      logger.info(
        { ...logContext, durationMs, rowCount: result.length },
        `Sales report query: ${name} completed`,
      );
      return result;
    } catch (err) {
      const durationMs = Date.now() - startTime;
      const cause = toError(err);
      logger.error(
        { ...logContext, durationMs, error: cause.message },
        `Sales report query: ${name} failed`,
      );
      throw new ReportError('Failed to fetch sales by country and category', { cause });
    }
  }

  async function salesByCountryCategory(
    input: ReportOptionsInput = {},
  ): Promise<SalesAggregateRow[]> {
    const options = resolveReportOptions(input);

    return run('salesByCountryCategory', options, () =>
      readonlyDb('orders as o')
        .join('order_items as oi', 'oi.order_id', 'o.order_id')
        .join('products as p', 'p.product_id', 'oi.product_id')
        .join('customers as c', 'c.customer_id', 'o.customer_id')
        .whereRaw(windowPredicate('o.order_date', options.windowPolicy), windowBindings(options))
        .select(aggregateColumns('o', 'oi'))
        .groupBy('o.shipping_country', 'p.category')
        .orderByRaw(AGGREGATE_ORDER_BY)
        .limit(options.limit),
    );
  }

  async function salesByCountryCategoryPrefiltered(
    input: ReportOptionsInput = {},
  ): Promise<SalesAggregateRow[]> {
    const options = resolveReportOptions(input);

    return run('salesByCountryCategoryPrefiltered', options, () =>
      readonlyDb
        .with('recent_orders', (qb: Knex.QueryBuilder) =>
          qb
            .select('order_id', 'customer_id', 'shipping_country', 'order_date')
            .from('orders')
            .whereRaw(windowPredicate('order_date', options.windowPolicy), windowBindings(options)),
        )
        .with('items', (qb: Knex.QueryBuilder) =>
          qb.select('order_id', 'product_id', 'quantity', 'line_total').from('order_items'),
        )
        .from('recent_orders as ro')
        .join('items as i', 'i.order_id', 'ro.order_id')
        .join('products as p', 'p.product_id', 'i.product_id')
        .join('customers as c', 'c.customer_id', 'ro.customer_id')
        .select(aggregateColumns('ro', 'i'))
        .groupBy('ro.shipping_country', 'p.category')
        .orderByRaw(AGGREGATE_ORDER_BY)
        .limit(options.limit),
    );
  }

  return {
    salesByCountryCategory,
    salesByCountryCategoryPrefiltered,
  };
}

export type SalesReportQueries = ReturnType<typeof createSalesReportQueries>;
