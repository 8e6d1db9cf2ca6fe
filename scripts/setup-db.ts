#!/usr/bin/env tsx

/**
 * Database Setup Script
 *
 * Applies src/infra/database/schema.sql in one transaction. Every statement
 * is idempotent, so the script can run against an existing database.
 *
 * Usage:
 *   DATABASE_URL=postgres://... tsx scripts/setup-db.ts
 */

import { readFile } from 'node:fs/promises';

import { sql } from 'kysely';

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';
import { createLogger } from '../src/infra/logger/index.js';

const SCHEMA_FILE = new URL('../src/infra/database/schema.sql', import.meta.url);

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, name: 'setup-db' });
  const db = initDatabase(config);

  try {
    const schema = await readFile(SCHEMA_FILE, 'utf8');
    await db.transaction().execute(async (trx) => {
      await sql.raw(schema).execute(trx);
    });
    logger.info({ file: SCHEMA_FILE.pathname }, 'Schema applied');
  } finally {
    await db.destroy();
  }
};

await main().catch((error: unknown) => {
  console.error('Database setup failed:', error);
  process.exit(1);
});
