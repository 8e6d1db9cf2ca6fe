import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { GamificationDatabase } from './types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type DbClient = Kysely<GamificationDatabase>;

/**
 * Initialize the database client
 */
export const initDatabase = (config: AppConfig): DbClient => {
  const connectionString = config.database.url;

  if (connectionString === '') {
    throw new Error('Missing configuration for database (DATABASE_URL)');
  }

  return new Kysely<GamificationDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

export type * from './types.js';
