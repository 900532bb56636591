/**
 * Read-only database connection for report queries.
 *
 * Uses a separate PostgreSQL user with SELECT-only privileges. Every pooled
 * connection gets a statement timeout and a UTC session time zone, so the
 * trailing window's day boundaries are UTC midnights.
 */

import { knex, type Knex } from 'knex';
import { logger } from '../utils/logger.js';

export const STATEMENT_TIMEOUT_MS = 30_000;
const POOL_MIN = 1;
const POOL_MAX = 5;

interface PgConnection {
  query: (sql: string, cb: (err: Error | null) => void) => void;
}

export function createReadonlyDb(connectionUrl: string): Knex {
  const db = knex({
    client: 'pg',
    connection: connectionUrl,
    pool: {
      min: POOL_MIN,
      max: POOL_MAX,
      afterCreate(conn: PgConnection, done: (err: Error | null, conn: unknown) => void) {
        conn.query(
          `SET statement_timeout = ${STATEMENT_TIMEOUT_MS}; SET TIME ZONE 'UTC'`,
          (err: Error | null) => {
            done(err, conn);
          },
        );
      },
    },
  });

  logger.info(
    { poolMin: POOL_MIN, poolMax: POOL_MAX, statementTimeoutMs: STATEMENT_TIMEOUT_MS },
    'Read-only database connection pool created',
  );

  return db;
}
