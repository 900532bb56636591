/**
 * Shared types for the trailing-window sales report.
 */

/** Identifiers arrive as numbers or, for BIGINT columns read through pg, as numeric strings. */
export type RecordId = number | string;

/** NUMERIC columns read through pg arrive as decimal strings. */
export type DecimalValue = number | string;

export interface OrderRecord {
  order_id: RecordId;
  customer_id: RecordId;
  shipping_country: string;
  order_date: Date;
}

export interface OrderItemRecord {
  order_id: RecordId;
  product_id: RecordId;
  quantity: number;
  line_total: DecimalValue;
}

export interface ProductRecord {
  product_id: RecordId;
  category: string;
}

export interface CustomerRecord {
  customer_id: RecordId;
}

export interface SalesSnapshot {
  orders: readonly OrderRecord[];
  orderItems: readonly OrderItemRecord[];
  products: readonly ProductRecord[];
  customers: readonly CustomerRecord[];
}

export interface SalesAggregateRow {
  shipping_country: string;
  category: string;
  orders: number;
  units: number;
  revenue: number;
  unique_customers: number;
}

/**
 * How the trailing window is compared against order timestamps.
 *
 * - `calendar_day`: DATE(order_date) >= DATE(now - windowDays)
 * - `current_date`: order_date >= DATE(now) - windowDays
 */
export type WindowPolicy = 'calendar_day' | 'current_date';

/** `direct` joins then filters; `prefiltered` narrows orders to the window before joining. */
export type ReportFormulation = 'direct' | 'prefiltered';

/** Where the aggregation runs. */
export type ReportEngine = 'database' | 'memory';

export interface SalesReportOptions {
  now: Date;
  windowDays: number;
  limit: number;
  windowPolicy: WindowPolicy;
}

export const WINDOW_POLICIES: readonly WindowPolicy[] = ['calendar_day', 'current_date'];
export const REPORT_FORMULATIONS: readonly ReportFormulation[] = ['direct', 'prefiltered'];
export const REPORT_ENGINES: readonly ReportEngine[] = ['database', 'memory'];

export const DEFAULT_WINDOW_DAYS = 90;
export const DEFAULT_REPORT_LIMIT = 100;
