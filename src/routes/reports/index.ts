/**
 * Report routes: read-only sales report by shipping country and product category.
 *
 * GET /api/reports/sales-by-country-category: trailing-window report rows,
 * sorted by revenue descending.
 *
 * GET /api/reports/sales-by-country-category/equivalence: runs the direct and
 * prefiltered formulations for the same `now` and reports whether they agree.
 *
 * Rate-limited per client IP.
 */

import type { FastifyInstance } from 'fastify';
import type { SalesReportService } from '../../services/salesReportService.js';
import type { RateLimiter } from '../../middleware/rateLimiter.js';
import {
  formulationComparisonQuerystringSchema,
  salesReportQuerystringSchema,
  toReportInput,
  type SalesReportQuerystring,
} from './querystring.js';

export interface ReportRoutesDeps {
  salesReportService: SalesReportService;
  rateLimiter?: RateLimiter;
}

export async function reportRoutes(fastify: FastifyInstance, deps: ReportRoutesDeps) {
  const { salesReportService, rateLimiter } = deps;

  fastify.get<{ Querystring: SalesReportQuerystring }>(
    '/api/reports/sales-by-country-category',
    { schema: { querystring: salesReportQuerystringSchema } },
    async (request, reply) => {
      if (rateLimiter) {
        await rateLimiter.checkLimit(request.ip);
      }

      const report = await salesReportService.generateReport(toReportInput(request.query));

      return reply.status(200).send({
        success: true,
        data: report,
      });
    },
  );

  fastify.get<{ Querystring: Omit<SalesReportQuerystring, 'formulation'> }>(
    '/api/reports/sales-by-country-category/equivalence',
    { schema: { querystring: formulationComparisonQuerystringSchema } },
    async (request, reply) => {
      if (rateLimiter) {
        await rateLimiter.checkLimit(request.ip);
      }

      const comparison = await salesReportService.compareFormulations(
        toReportInput(request.query),
      );

      return reply.status(200).send({
        success: true,
        data: comparison,
      });
    },
  );
}
