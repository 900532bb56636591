/**
 * Sales Report Service: produces the trailing-window sales report.
 *
 * Picks the engine (PostgreSQL or in-memory over a loaded snapshot) and the
 * formulation (direct or prefiltered), applies configured defaults, and can
 * run both formulations side by side to confirm they agree.
 *
 * Any failure aborts the whole report; no partial result is returned.
 */

import type { SalesReportQueries } from '../reports/salesReportQueries.js';
import type { SnapshotLoader } from '../reports/snapshotLoader.js';
import { aggregateSalesDirect, aggregateSalesPrefiltered } from '../reports/salesAggregator.js';
import { resolveReportOptions, type ReportOptionsInput } from '../reports/reportOptions.js';
import { resolveWindowStart } from '../reports/trailingWindow.js';
import type {
  ReportEngine,
  ReportFormulation,
  SalesAggregateRow,
  SalesReportOptions,
  SalesSnapshot,
  WindowPolicy,
} from '../reports/types.js';
import { logger } from '../utils/logger.js';

export interface SalesReportDefaults {
  windowDays?: number;
  limit?: number;
  windowPolicy?: WindowPolicy;
  formulation?: ReportFormulation;
  engine?: ReportEngine;
}

export interface SalesReportServiceDeps {
  salesReportQueries: SalesReportQueries;
  snapshotLoader: SnapshotLoader;
  defaults?: SalesReportDefaults;
}

export interface GenerateReportInput extends ReportOptionsInput {
  formulation?: ReportFormulation;
  engine?: ReportEngine;
}

export type CompareFormulationsInput = Omit<GenerateReportInput, 'formulation'>;

export interface SalesReport {
  generatedAt: string;
  windowStart: string;
  windowDays: number;
  windowPolicy: WindowPolicy;
  formulation: ReportFormulation;
  engine: ReportEngine;
  limit: number;
  rowCount: number;
  rows: SalesAggregateRow[];
}

export interface FormulationComparison {
  generatedAt: string;
  windowStart: string;
  windowDays: number;
  windowPolicy: WindowPolicy;
  engine: ReportEngine;
  equivalent: boolean;
  directRowCount: number;
  prefilteredRowCount: number;
  mismatchedRows: number;
}

function rowsEqual(a: SalesAggregateRow | undefined, b: SalesAggregateRow | undefined): boolean {
  if (!a || !b) return false;
  return (
    a.shipping_country === b.shipping_country &&
    a.category === b.category &&
    a.orders === b.orders &&
    a.units === b.units &&
    a.revenue === b.revenue &&
    a.unique_customers === b.unique_customers
  );
}

export function countMismatchedRows(
  direct: readonly SalesAggregateRow[],
  prefiltered: readonly SalesAggregateRow[],
): number {
  const length = Math.max(direct.length, prefiltered.length);
  let mismatched = 0;
  for (let i = 0; i < length; i++) {
    if (!rowsEqual(direct[i], prefiltered[i])) {
      mismatched++;
    }
  }
  return mismatched;
}

export function createSalesReportService(deps: SalesReportServiceDeps) {
  const { salesReportQueries, snapshotLoader, defaults = {} } = deps;

  async function runFormulation(
    engine: ReportEngine,
    formulation: ReportFormulation,
    options: SalesReportOptions,
    snapshot?: SalesSnapshot,
  ): Promise<SalesAggregateRow[]> {
    if (engine === 'database') {
      return formulation === 'direct'
        ? salesReportQueries.salesByCountryCategory(options)
        : salesReportQueries.salesByCountryCategoryPrefiltered(options);
    }

    const source = snapshot ?? (await snapshotLoader.load());
    return formulation === 'direct'
      ? aggregateSalesDirect(source, options)
      : aggregateSalesPrefiltered(source, options);
  }

  async function generateReport(input: GenerateReportInput = {}): Promise<SalesReport> {
    const options = resolveReportOptions(input, defaults);
    const formulation = input.formulation ?? defaults.formulation ?? 'direct';
    const engine = input.engine ?? defaults.engine ?? 'database';

    const rows = await runFormulation(engine, formulation, options);

    logger.info(
      { engine, formulation, windowPolicy: options.windowPolicy, rowCount: rows.length },
      'Sales report generated',
    );

    return {
      generatedAt: options.now.toISOString(),
      windowStart: resolveWindowStart(options.now, options.windowDays, options.windowPolicy).toISOString(),
      windowDays: options.windowDays,
      windowPolicy: options.windowPolicy,
      formulation,
      engine,
      limit: options.limit,
      rowCount: rows.length,
      rows,
    };
  }

  async function compareFormulations(
    input: CompareFormulationsInput = {},
  ): Promise<FormulationComparison> {
    const options = resolveReportOptions(input, defaults);
    const engine = input.engine ?? defaults.engine ?? 'database';

    // One snapshot for both formulations so they see the same data.
    const snapshot = engine === 'memory' ? await snapshotLoader.load() : undefined;
    const [direct, prefiltered] = await Promise.all([
      runFormulation(engine, 'direct', options, snapshot),
      runFormulation(engine, 'prefiltered', options, snapshot),
    ]);

    const mismatchedRows = countMismatchedRows(direct, prefiltered);
    const equivalent = mismatchedRows === 0;

    if (!equivalent) {
      logger.warn(
        { engine, windowPolicy: options.windowPolicy, mismatchedRows },
        'Sales report formulations disagree',
      );
    }

    return {
      generatedAt: options.now.toISOString(),
      windowStart: resolveWindowStart(options.now, options.windowDays, options.windowPolicy).toISOString(),
      windowDays: options.windowDays,
      windowPolicy: options.windowPolicy,
      engine,
      equivalent,
      directRowCount: direct.length,
      prefilteredRowCount: prefiltered.length,
      mismatchedRows,
    };
  }

  return {
    generateReport,
    compareFormulations,
  };
}

export type SalesReportService = ReturnType<typeof createSalesReportService>;
