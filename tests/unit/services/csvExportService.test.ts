import { jest, describe, it, expect, beforeEach } from '@jest/globals';

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import {
  createCsvExportService,
  escapeCsvValue,
  salesReportToCsv,
} from '../../../src/services/csvExportService.js';
import type { SalesReport, SalesReportService } from '../../../src/services/salesReportService.js';
import { ReportError } from '../../../src/utils/errors.js';
import { logger } from '../../../src/utils/logger.js';

const UTF8_BOM = '\uFEFF';

function makeReport(overrides: Partial<SalesReport> = {}): SalesReport {
  const rows = overrides.rows ?? [
    { shipping_country: 'US', category: 'Books', orders: 1, units: 3, revenue: 35, unique_customers: 1 },
    { shipping_country: 'DE', category: 'Home, Garden', orders: 2, units: 5, revenue: 12.5, unique_customers: 2 },
  ];
  return {
    generatedAt: '2026-10-19T15:30:00.000Z',
    windowStart: '2026-07-21T00:00:00.000Z',
    windowDays: 90,
    windowPolicy: 'calendar_day',
    formulation: 'direct',
    engine: 'database',
    limit: 100,
    rowCount: rows.length,
    rows,
    ...overrides,
  };
}

function createMockReportService(report: SalesReport) {
  return {
    generateReport: jest.fn<SalesReportService['generateReport']>().mockResolvedValue(report),
    compareFormulations: jest.fn<SalesReportService['compareFormulations']>(),
  };
}

describe('escapeCsvValue', () => {
  it('returns plain values unchanged', () => {
    expect(escapeCsvValue('Books')).toBe('Books');
  });

  it('quotes values containing commas', () => {
    expect(escapeCsvValue('Home, Garden')).toBe('"Home, Garden"');
  });

  it('doubles embedded quotes', () => {
    expect(escapeCsvValue('12" Vinyl')).toBe('"12"" Vinyl"');
  });

  it('quotes values containing line breaks', () => {
    expect(escapeCsvValue('a\nb')).toBe('"a\nb"');
  });

  it('renders null and undefined as empty', () => {
    expect(escapeCsvValue(null)).toBe('');
    expect(escapeCsvValue(undefined)).toBe('');
  });
});

describe('salesReportToCsv', () => {
  it('writes a BOM, the header and one CRLF-separated line per row', () => {
    expect(salesReportToCsv(makeReport())).toBe(
      UTF8_BOM +
        'shipping_country,category,orders,units,revenue,unique_customers\r\n' +
        'US,Books,1,3,35.00,1\r\n' +
        'DE,"Home, Garden",2,5,12.50,2',
    );
  });

  it('writes only the header for an empty report', () => {
    expect(salesReportToCsv(makeReport({ rows: [] }))).toBe(
      UTF8_BOM + 'shipping_country,category,orders,units,revenue,unique_customers',
    );
  });
});

describe('createCsvExportService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('names the file after the report date', async () => {
    const salesReportService = createMockReportService(makeReport());
    const service = createCsvExportService({ salesReportService });

    const result = await service.exportSalesReport();

    expect(result.filename).toBe('sales-by-country-category-2026-10-19.csv');
    expect(result.rowCount).toBe(2);
    expect(result.content.startsWith(UTF8_BOM)).toBe(true);
  });

  it('passes report input through to the report service', async () => {
    const salesReportService = createMockReportService(makeReport());
    const service = createCsvExportService({ salesReportService });
    const now = new Date('2026-10-19T15:30:00.000Z');

    await service.exportSalesReport({ now, limit: 5, engine: 'memory' });

    expect(salesReportService.generateReport).toHaveBeenCalledWith({ now, limit: 5, engine: 'memory' });
  });

  it('logs the export', async () => {
    const salesReportService = createMockReportService(makeReport());
    const service = createCsvExportService({ salesReportService });

    await service.exportSalesReport();

    expect(logger.info).toHaveBeenCalledWith(
      { rowCount: 2, engine: 'database', formulation: 'direct' },
      'CSV exported for sales report',
    );
  });

  it('propagates report failures', async () => {
    const salesReportService = createMockReportService(makeReport());
    salesReportService.generateReport.mockRejectedValue(new ReportError('Failed to load sales snapshot'));
    const service = createCsvExportService({ salesReportService });

    await expect(service.exportSalesReport()).rejects.toThrow('Failed to load sales snapshot');
  });
});
