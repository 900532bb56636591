import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';
import type { Redis } from 'ioredis';

interface HealthDeps {
  readonlyDb: Knex;
  redis: Redis;
  startTime: number;
}

type ConnectionStatus = 'connected' | 'disconnected';

async function checkReadonlyDb(readonlyDb: Knex): Promise<ConnectionStatus> {
  try {
    await readonlyDb.raw('SELECT 1');
    return 'connected';
  } catch {
    return 'disconnected';
  }
}

async function checkRedis(redis: Redis): Promise<ConnectionStatus> {
  try {
    return (await redis.ping()) === 'PONG' ? 'connected' : 'disconnected';
  } catch {
    return 'disconnected';
  }
}

export async function healthRoutes(fastify: FastifyInstance, deps: HealthDeps) {
  fastify.get('/health', async (_request, reply) => {
    const [db, redis] = await Promise.all([
      checkReadonlyDb(deps.readonlyDb),
      checkRedis(deps.redis),
    ]);

    // Redis only backs rate limiting, so reports stay available without it.
    const reportsAvailable = db === 'connected';

    return reply.status(reportsAvailable ? 200 : 503).send({
      status: reportsAvailable && redis === 'connected' ? 'ok' : 'degraded',
      version: '1.0.0',
      uptime: Math.floor((Date.now() - deps.startTime) / 1000),
      db,
      redis,
    });
  });
}
