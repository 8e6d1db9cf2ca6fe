#!/usr/bin/env tsx

/**
 * Achievement Seed Script
 *
 * Upserts the achievement catalog by code. Existing rows keep their id;
 * title, trigger and reward are overwritten.
 *
 * Usage:
 *   tsx scripts/seed-achievements.ts
 *   tsx scripts/seed-achievements.ts --file ./my-achievements.json
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { initDatabase } from '../src/infra/database/client.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  DEFAULT_ACHIEVEMENTS_FILE,
  loadAchievementSeeds,
  seedAchievements,
} from '../src/modules/gamification/shell/seeds/seed-achievements.js';

const parseFileArg = (argv: readonly string[]): URL => {
  const index = argv.indexOf('--file');
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value !== undefined ? pathToFileURL(path.resolve(value)) : DEFAULT_ACHIEVEMENTS_FILE;
};

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, name: 'seed-achievements' });

  const seedsResult = await loadAchievementSeeds(parseFileArg(process.argv.slice(2)));
  if (seedsResult.isErr()) {
    logger.error({ err: seedsResult.error.cause }, seedsResult.error.message);
    process.exitCode = 1;
    return;
  }

  const db = initDatabase(config);
  try {
    const result = await seedAchievements(db, seedsResult.value, logger);
    if (result.isErr()) {
      logger.error({ err: result.error.cause }, result.error.message);
      process.exitCode = 1;
      return;
    }
    logger.info({ count: result.value }, 'Achievements seeded');
  } finally {
    await db.destroy();
  }
};

await main().catch((error: unknown) => {
  console.error('Achievement seeding failed:', error);
  process.exit(1);
});
