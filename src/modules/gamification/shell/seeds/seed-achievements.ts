/**
 * Achievement Catalog Seeder
 *
 * Loads the catalog from achievements.json and upserts it by code.
 * Safe to run repeatedly; existing rows are updated in place.
 */

import { readFile } from 'node:fs/promises';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import { ACHIEVEMENT_TRIGGER_KINDS } from '../../core/types.js';

import type { DbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const UUID_PATTERN = '^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$';

export const AchievementSeedSchema = Type.Object(
  {
    id: Type.String({ pattern: UUID_PATTERN }),
    code: Type.String({ minLength: 1, maxLength: 100 }),
    title: Type.String({ minLength: 1 }),
    description: Type.String(),
    icon: Type.Union([Type.String(), Type.Null()]),
    category: Type.String({ minLength: 1 }),
    triggerKind: Type.Union(ACHIEVEMENT_TRIGGER_KINDS.map((kind) => Type.Literal(kind))),
    triggerThreshold: Type.Integer({ minimum: 1 }),
    pointsReward: Type.Integer({ minimum: 0 }),
    sortOrder: Type.Integer(),
    isActive: Type.Boolean(),
  },
  { additionalProperties: false }
);

export type AchievementSeed = Static<typeof AchievementSeedSchema>;

const AchievementSeedFileSchema = Type.Array(AchievementSeedSchema);

export const DEFAULT_ACHIEVEMENTS_FILE = new URL('./achievements.json', import.meta.url);

export interface SeedError {
  type: 'SeedError';
  message: string;
  cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses and validates seed file contents. Codes must be unique.
 */
export function parseAchievementSeeds(raw: unknown): Result<AchievementSeed[], SeedError> {
  if (!Value.Check(AchievementSeedFileSchema, raw)) {
    const details = [...Value.Errors(AchievementSeedFileSchema, raw)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    return err({ type: 'SeedError', message: `Invalid achievement seed file: ${details}` });
  }

  const seen = new Set<string>();
  for (const seed of raw) {
    if (seen.has(seed.code)) {
      return err({ type: 'SeedError', message: `Duplicate achievement code '${seed.code}'` });
    }
    seen.add(seed.code);
  }

  return ok(raw);
}

export async function loadAchievementSeeds(
  file: URL = DEFAULT_ACHIEVEMENTS_FILE
): Promise<Result<AchievementSeed[], SeedError>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf8'));
  } catch (error) {
    return err({ type: 'SeedError', message: `Cannot read ${file.pathname}`, cause: error });
  }
  return parseAchievementSeeds(raw);
}

// ─────────────────────────────────────────────────────────────────────────────
// Upsert
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Upserts every seed by code in one transaction.
 */
export async function seedAchievements(
  db: DbClient,
  seeds: readonly AchievementSeed[],
  logger: Logger
): Promise<Result<number, SeedError>> {
  const log = logger.child({ task: 'seed-achievements' });

  if (seeds.length === 0) {
    return ok(0);
  }

  try {
    await db.transaction().execute(async (trx) => {
      for (const seed of seeds) {
        const values = {
          title: seed.title,
          description: seed.description,
          icon: seed.icon,
          category: seed.category,
          trigger_kind: seed.triggerKind,
          trigger_threshold: seed.triggerThreshold,
          points_reward: seed.pointsReward,
          sort_order: seed.sortOrder,
          is_active: seed.isActive,
        };

        await trx
          .insertInto('achievements')
          .values({ id: seed.id, code: seed.code, ...values })
          .onConflict((oc) => oc.column('code').doUpdateSet(values))
          .execute();

        log.debug({ code: seed.code }, 'Upserted achievement');
      }
    });
  } catch (error) {
    log.error({ err: error }, 'Failed to seed achievements');
    return err({ type: 'SeedError', message: 'Failed to seed achievements', cause: error });
  }

  log.info({ count: seeds.length }, 'Achievement catalog seeded');
  return ok(seeds.length);
}
