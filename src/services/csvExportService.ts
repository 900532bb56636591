import type { SalesAggregateRow } from '../reports/types.js';
import type { GenerateReportInput, SalesReport, SalesReportService } from './salesReportService.js';
import { logger } from '../utils/logger.js';

const UTF8_BOM = '\uFEFF';

export const SALES_REPORT_CSV_HEADER = [
  'shipping_country',
  'category',
  'orders',
  'units',
  'revenue',
  'unique_customers',
] as const;

export interface CsvExportServiceDeps {
  salesReportService: SalesReportService;
}

export interface CsvExport {
  filename: string;
  content: string;
  rowCount: number;
}

export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = String(value);
  // If the value contains commas, quotes, or newlines, wrap in quotes and escape internal quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return '"' + str.replace(/"/g, '""') + '"';
  }
  return str;
}

function rowToCsvValues(row: SalesAggregateRow): string[] {
  return [
    row.shipping_country,
    row.category,
    String(row.orders),
    String(row.units),
    row.revenue.toFixed(2),
    String(row.unique_customers),
  ];
}

function rowsToCsvString(rows: string[][]): string {
  return rows.map((row) => row.map(escapeCsvValue).join(',')).join('\r\n');
}

export function salesReportToCsv(report: SalesReport): string {
  const rows = [[...SALES_REPORT_CSV_HEADER], ...report.rows.map(rowToCsvValues)];
  return UTF8_BOM + rowsToCsvString(rows);
}

export function createCsvExportService(deps: CsvExportServiceDeps) {
  const { salesReportService } = deps;

  async function exportSalesReport(input: GenerateReportInput = {}): Promise<CsvExport> {
    const report = await salesReportService.generateReport(input);
    const content = salesReportToCsv(report);
    const dateStr = report.generatedAt.split('T')[0];

    logger.info(
      { rowCount: report.rowCount, engine: report.engine, formulation: report.formulation },
      'CSV exported for sales report',
    );

    return {
      filename: `sales-by-country-category-${dateStr}.csv`,
      content,
      rowCount: report.rowCount,
    };
  }

  return {
    exportSalesReport,
  };
}

export type CsvExportService = ReturnType<typeof createCsvExportService>;
