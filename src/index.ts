import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import { Redis as IORedis } from 'ioredis';
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { healthRoutes } from './routes/health.js';
import { reportRoutes } from './routes/reports/index.js';
import { csvExportRoutes } from './routes/exports/csv.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { createRateLimiter } from './middleware/rateLimiter.js';
import { createReadonlyDb } from './db/readonlyConnection.js';
import { createSalesReportQueries } from './reports/salesReportQueries.js';
import { createSnapshotLoader } from './reports/snapshotLoader.js';
import { createSalesReportService } from './services/salesReportService.js';
import { createCsvExportService } from './services/csvExportService.js';

const startTime = Date.now();

const fastify = Fastify({
  logger: false,
  requestIdHeader: 'x-request-id',
  genReqId: () => randomUUID(),
});

// Read-only database (all report queries)
const readonlyDb = createReadonlyDb(config.database.readonlyUrl);

// Redis
const redis = new IORedis(config.redis.url, {
  maxRetriesPerRequest: 3,
  retryStrategy(times: number) {
    if (times > 3) return null;
    return Math.min(times * 200, 2000);
  },
});

// Request logging
fastify.addHook('onRequest', async (request) => {
  logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request received');
});

fastify.addHook('onResponse', async (request, reply) => {
  logger.info(
    { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode },
    'Request completed',
  );
});

// Error handler
registerErrorHandler(fastify);

// Report services
const salesReportQueries = createSalesReportQueries({ readonlyDb });
const snapshotLoader = createSnapshotLoader({ readonlyDb });
const salesReportService = createSalesReportService({
  salesReportQueries,
  snapshotLoader,
  defaults: config.report,
});
const csvExportService = createCsvExportService({ salesReportService });

// Rate limiter
const rateLimiter = createRateLimiter({
  redis,
  config: {
    maxRequests: config.rateLimit.reportMaxRequests,
    windowSeconds: config.rateLimit.reportWindowSeconds,
  },
});

async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully...');
  await fastify.close();
  await readonlyDb.destroy();
  redis.disconnect();
  logger.info('Server shut down');
  process.exit(0);
}

async function start() {
  await fastify.register(async (instance) => healthRoutes(instance, { readonlyDb, redis, startTime }));

  await fastify.register(async (instance) =>
    reportRoutes(instance, { salesReportService, rateLimiter }),
  );

  await fastify.register(async (instance) =>
    csvExportRoutes(instance, { csvExportService, rateLimiter }),
  );

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err, signal }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, 'Server started');
}

start().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});

export { fastify, readonlyDb, redis };
