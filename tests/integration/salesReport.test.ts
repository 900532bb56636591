import { jest, describe, it, expect, beforeAll, afterAll, beforeEach } from '@jest/globals';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';

// ── Mock logger ─────────────────────────────────────────────────────

jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { createSalesReportQueries } from '../../src/reports/salesReportQueries.js';
import { createSnapshotLoader } from '../../src/reports/snapshotLoader.js';
import { createSalesReportService } from '../../src/services/salesReportService.js';
import { createCsvExportService } from '../../src/services/csvExportService.js';
import { reportRoutes } from '../../src/routes/reports/index.js';
import { csvExportRoutes } from '../../src/routes/exports/csv.js';
import { registerErrorHandler } from '../../src/middleware/errorHandler.js';
import { generateSyntheticDataset } from '../../src/data/syntheticDataGenerator.js';

// ── In-memory "database" ───────────────────────────────────────────

type Tables = Record<string, Array<Record<string, unknown>>>;

// Rows shaped the way pg returns them: BIGINT and NUMERIC as strings.
const SHOP_TABLES: Tables = {
  orders: [
    { order_id: '1', customer_id: '1', shipping_country: 'US', order_date: new Date('2026-10-18T09:00:00Z') },
    { order_id: '2', customer_id: '2', shipping_country: 'US', order_date: new Date('2026-10-01T12:00:00Z') },
    { order_id: '3', customer_id: '1', shipping_country: 'DE', order_date: new Date('2026-07-20T23:59:59Z') },
    { order_id: '4', customer_id: '3', shipping_country: 'DE', order_date: new Date('2026-07-21T00:00:00Z') },
    { order_id: '5', customer_id: '99', shipping_country: 'FR', order_date: new Date('2026-10-10T08:00:00Z') },
  ],
  order_items: [
    { order_id: '1', product_id: '1', quantity: 2, line_total: '20.00' },
    { order_id: '1', product_id: '2', quantity: 1, line_total: '5.50' },
    { order_id: '2', product_id: '1', quantity: 1, line_total: '15.00' },
    { order_id: '2', product_id: '404', quantity: 1, line_total: '9.99' },
    { order_id: '3', product_id: '1', quantity: 5, line_total: '100.00' },
    { order_id: '4', product_id: '2', quantity: 3, line_total: '30.00' },
    { order_id: '5', product_id: '1', quantity: 1, line_total: '50.00' },
  ],
  products: [
    { product_id: '1', category: 'Books' },
    { product_id: '2', category: 'Toys' },
  ],
  customers: [{ customer_id: '1' }, { customer_id: '2' }, { customer_id: '3' }],
};

function createFakeDb(tables: Tables) {
  return jest.fn((table: string) => ({
    select: jest.fn(async () => tables[table] ?? []),
  }));
}

async function buildApp(tables: Tables): Promise<{ app: FastifyInstance; fakeDb: ReturnType<typeof createFakeDb> }> {
  const fakeDb = createFakeDb(tables);
  const readonlyDb = fakeDb as unknown as Parameters<typeof createSnapshotLoader>[0]['readonlyDb'];

  const salesReportService = createSalesReportService({
    salesReportQueries: createSalesReportQueries({ readonlyDb }),
    snapshotLoader: createSnapshotLoader({ readonlyDb }),
    defaults: { engine: 'memory' },
  });
  const csvExportService = createCsvExportService({ salesReportService });

  const app = Fastify({ logger: false });
  registerErrorHandler(app);
  await app.register(async (instance) => reportRoutes(instance, { salesReportService }));
  await app.register(async (instance) => csvExportRoutes(instance, { csvExportService }));
  await app.ready();
  return { app, fakeDb };
}

const NOW = '2026-10-19T15:30:00Z';

const EXPECTED_ROWS = [
  { shipping_country: 'US', category: 'Books', orders: 2, units: 3, revenue: 35, unique_customers: 2 },
  { shipping_country: 'DE', category: 'Toys', orders: 1, units: 3, revenue: 30, unique_customers: 1 },
  { shipping_country: 'US', category: 'Toys', orders: 1, units: 1, revenue: 5.5, unique_customers: 1 },
];

// ── Tests ───────────────────────────────────────────────────────────

describe('sales report over the in-memory engine', () => {
  let app: FastifyInstance;
  let fakeDb: ReturnType<typeof createFakeDb>;

  beforeAll(async () => {
    ({ app, fakeDb } = await buildApp(SHOP_TABLES));
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    fakeDb.mockClear();
  });

  it('aggregates the trailing 90 days by country and category', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/reports/sales-by-country-category?now=${NOW}`,
    });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body.data.rows).toEqual(EXPECTED_ROWS);
    expect(body.data.windowStart).toBe('2026-07-21T00:00:00.000Z');
    expect(body.data.engine).toBe('memory');
    expect(body.data.formulation).toBe('direct');
  });

  it('returns the same rows from the prefiltered formulation', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/reports/sales-by-country-category?now=${NOW}&formulation=prefiltered`,
    });

    expect(JSON.parse(response.body).data.rows).toEqual(EXPECTED_ROWS);
  });

  it('returns the same rows under the current_date window policy', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/reports/sales-by-country-category?now=${NOW}&windowPolicy=current_date`,
    });

    expect(JSON.parse(response.body).data.rows).toEqual(EXPECTED_ROWS);
  });

  it('truncates to the limit after sorting', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/reports/sales-by-country-category?now=${NOW}&limit=1`,
    });
    const body = JSON.parse(response.body);

    expect(body.data.rowCount).toBe(1);
    expect(body.data.rows).toEqual([EXPECTED_ROWS[0]]);
  });

  it('confirms the two formulations agree', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/reports/sales-by-country-category/equivalence?now=${NOW}`,
    });
    const body = JSON.parse(response.body);

    expect(body.data).toEqual({
      generatedAt: '2026-10-19T15:30:00.000Z',
      windowStart: '2026-07-21T00:00:00.000Z',
      windowDays: 90,
      windowPolicy: 'calendar_day',
      engine: 'memory',
      equivalent: true,
      directRowCount: 3,
      prefilteredRowCount: 3,
      mismatchedRows: 0,
    });
    // One snapshot: one read per table.
    expect(fakeDb).toHaveBeenCalledTimes(4);
  });

  it('exports the report as CSV', async () => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/exports/sales-by-country-category.csv?now=${NOW}`,
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe(
      'attachment; filename="sales-by-country-category-2026-10-19.csv"',
    );
    expect(response.rawPayload.toString('utf8')).toBe(
      '\uFEFFshipping_country,category,orders,units,revenue,unique_customers\r\n' +
        'US,Books,2,3,35.00,2\r\n' +
        'DE,Toys,1,3,30.00,1\r\n' +
        'US,Toys,1,1,5.50,1',
    );
  });
});

describe('formulation equivalence on generated data', () => {
  const dataset = generateSyntheticDataset({
    customers: 60,
    products: 40,
    orders: 400,
    seed: 21,
    now: new Date('2026-10-19T15:30:00Z'),
    historyDays: 200,
  });

  // Drop a few referenced rows so the inner joins have something to discard.
  const tables: Tables = {
    orders: dataset.orders.map((o) => ({ ...o })),
    order_items: dataset.orderItems.map((i) => ({ ...i })),
    products: dataset.products.filter((p) => p.product_id % 13 !== 0).map((p) => ({ ...p })),
    customers: dataset.customers.filter((c) => c.customer_id % 11 !== 0).map((c) => ({ ...c })),
  };

  let app: FastifyInstance;

  beforeAll(async () => {
    ({ app } = await buildApp(tables));
  });

  afterAll(async () => {
    await app.close();
  });

  it.each(['calendar_day', 'current_date'])('agrees under the %s policy', async (policy) => {
    const response = await app.inject({
      method: 'GET',
      url: `/api/reports/sales-by-country-category/equivalence?now=${NOW}&windowPolicy=${policy}&limit=1000`,
    });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body.data.equivalent).toBe(true);
    expect(body.data.directRowCount).toBeGreaterThan(0);
    expect(body.data.directRowCount).toBe(body.data.prefilteredRowCount);
  });
});
