import type { FastifyInstance } from 'fastify';
import type { CsvExportService } from '../../services/csvExportService.js';
import type { RateLimiter } from '../../middleware/rateLimiter.js';
import {
  salesReportQuerystringSchema,
  toReportInput,
  type SalesReportQuerystring,
} from '../reports/querystring.js';

export interface CsvExportRoutesDeps {
  csvExportService: CsvExportService;
  rateLimiter?: RateLimiter;
}

export async function csvExportRoutes(
  fastify: FastifyInstance,
  deps: CsvExportRoutesDeps,
) {
  const { csvExportService, rateLimiter } = deps;

  // GET /api/exports/sales-by-country-category.csv: the sales report as a CSV attachment
  fastify.get<{ Querystring: SalesReportQuerystring }>(
    '/api/exports/sales-by-country-category.csv',
    { schema: { querystring: salesReportQuerystringSchema } },
    async (request, reply) => {
      if (rateLimiter) {
        await rateLimiter.checkLimit(request.ip);
      }

      const csvExport = await csvExportService.exportSalesReport(toReportInput(request.query));

      return reply
        .status(200)
        .header('Content-Type', 'text/csv; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="${csvExport.filename}"`)
        .send(csvExport.content);
    },
  );
}
