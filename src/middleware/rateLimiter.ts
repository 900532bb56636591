/**
 * Redis-backed per-client rate limiter using a fixed window counter.
 *
 * Uses a Redis key per client and scope with TTL equal to the window size.
 * Each report request increments the counter; requests beyond max are rejected
 * with a RateLimitError that includes the retryAfter duration.
 */

import type { Redis as IORedisType } from 'ioredis';
import { RateLimitError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RateLimiterConfig {
  maxRequests: number;
  windowSeconds: number;
}

export interface RateLimiterDeps {
  redis: IORedisType;
  config: RateLimiterConfig;
  scope?: string;
}

/**
 * Atomic INCR + EXPIRE. The TTL is set only on the first hit so a crash
 * between the two commands cannot leave a key without expiry.
 */
const INCR_WITH_EXPIRE_LUA = `
local current = redis.call('INCR', KEYS[1])
if tonumber(current) == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return current
`;

export function createRateLimiter(deps: RateLimiterDeps) {
  const { redis, config, scope = 'reports' } = deps;

  /**
   * Check and increment the rate limit counter for a client.
   * Throws RateLimitError if the client has exceeded the allowed requests.
   */
  async function checkLimit(clientId: string): Promise<void> {
    const key = `ratelimit:${clientId}:${scope}`;

    try {
      const current = Number(
        await redis.eval(INCR_WITH_EXPIRE_LUA, 1, key, config.windowSeconds),
      );

      if (current > config.maxRequests) {
        const ttl = await redis.ttl(key);
        const retryAfter = ttl > 0 ? ttl : config.windowSeconds;

        logger.warn(
          { clientId, scope, current, max: config.maxRequests, retryAfter },
          'Rate limit exceeded for client',
        );

        throw new RateLimitError('Too many report requests. Please wait a moment.', {
          retryAfter,
        });
      }
    } catch (err) {
      if (err instanceof RateLimitError) {
        throw err;
      }

      // Redis errors should not block requests; log and allow through
      logger.error({ err, clientId, scope }, 'Rate limiter Redis error, allowing request');
    }
  }

  return { checkLimit };
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;
