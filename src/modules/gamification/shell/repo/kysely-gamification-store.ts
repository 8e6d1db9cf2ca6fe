/**
 * Gamification Store - Kysely Implementation
 *
 * Implements GamificationStore over PostgreSQL. Each unit of work is a SERIALIZABLE
 * transaction; progress and streak rows are read FOR UPDATE so that concurrent
 * events for the same user serialize instead of interleaving.
 */

import { sql, type Kysely } from 'kysely';
import { ok, err, Result } from 'neverthrow';

import { buildAchievementTrigger } from '../../core/achievements.js';
import {
  createConcurrencyConflictError,
  createStoreUnavailableError,
  type GamificationError,
} from '../../core/errors.js';

import type {
  GamificationStore,
  GamificationTx,
  InsertOutcome,
  ProgressTotals,
} from '../../core/ports.js';
import type {
  Achievement,
  EarnedAchievement,
  LessonProgress,
  NewPointsEntry,
  PointsEntry,
  PointsReason,
  ReferenceType,
  UserAchievement,
  UserPoints,
  UserStreak,
} from '../../core/types.js';
import type { DbClient, GamificationDatabase } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the store.
 */
export interface GamificationStoreOptions {
  db: DbClient;
  logger: Logger;
}

type StoreResult<T> = Promise<Result<T, GamificationError>>;

// ─────────────────────────────────────────────────────────────────────────────
// Error Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PostgreSQL error codes that mean "another writer got there first".
 * 40001 serialization_failure, 40P01 deadlock_detected, 23505 unique_violation.
 */
const CONFLICT_CODES = new Set(['40001', '40P01', '23505']);

const getPgErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

/**
 * Maps a driver error to the domain error union.
 */
export const toStoreError = (message: string, error: unknown): GamificationError => {
  const code = getPgErrorCode(error);
  if (code !== undefined && CONFLICT_CODES.has(code)) {
    return createConcurrencyConflictError(message, error);
  }
  return createStoreUnavailableError(message, error);
};

/**
 * Carries a domain error out of the Kysely transaction callback so that the
 * transaction rolls back.
 */
class RollbackSignal extends Error {
  readonly error: GamificationError;

  constructor(error: GamificationError) {
    super(error.message);
    this.name = 'RollbackSignal';
    this.error = error;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Row Mapping
// ─────────────────────────────────────────────────────────────────────────────

interface PointsHistoryRow {
  id: string;
  user_id: string;
  points: number;
  reason: string;
  reference_type: string;
  reference_id: string | null;
  note: string | null;
  created_at: Date;
}

interface AchievementRow {
  id: string;
  code: string;
  title: string;
  description: string;
  icon: string | null;
  category: string;
  trigger_kind: string;
  trigger_threshold: number;
  points_reward: number;
  sort_order: number;
  is_active: boolean;
}

const POINTS_REASONS: readonly PointsReason[] = [
  'lesson_completed',
  'course_completed',
  'achievement_unlocked',
  'manual_adjustment',
];

const REFERENCE_TYPES: readonly ReferenceType[] = ['lesson', 'course', 'achievement', 'adjustment'];

const isPointsReason = (value: string): value is PointsReason =>
  POINTS_REASONS.some((reason) => reason === value);

const isReferenceType = (value: string): value is ReferenceType =>
  REFERENCE_TYPES.some((type) => type === value);

/**
 * Parses a BIGINT progress value, which the driver returns as text.
 */
export const toProgressValue = (raw: string | null): number | null =>
  raw === null ? null : Number(raw);

// ─────────────────────────────────────────────────────────────────────────────
// Unit of Work
// ─────────────────────────────────────────────────────────────────────────────

class KyselyGamificationTx implements GamificationTx {
  constructor(
    private readonly db: Kysely<GamificationDatabase>,
    private readonly log: Logger,
    /** Lock rows read for update; only meaningful inside a transaction */
    private readonly lockRows: boolean
  ) {}

  // ─────────────────────────────────────────────────────────────────────────
  // Lesson Progress
  // ─────────────────────────────────────────────────────────────────────────

  async findLessonProgress(userId: string, lessonId: string): StoreResult<LessonProgress | null> {
    try {
      let query = this.db
        .selectFrom('lessonprogress')
        .select([
          'user_id',
          'lesson_id',
          'watched_seconds',
          'last_position_seconds',
          'completion_percentage',
          'is_completed',
          'completed_at',
          'last_updated_at',
        ])
        .where('user_id', '=', userId)
        .where('lesson_id', '=', lessonId);

      if (this.lockRows) {
        query = query.forUpdate();
      }

      const row = await query.executeTakeFirst();
      if (row === undefined) {
        return ok(null);
      }

      return ok({
        userId: row.user_id,
        lessonId: row.lesson_id,
        watchedSeconds: row.watched_seconds,
        lastPositionSeconds: row.last_position_seconds,
        completionPercentage: row.completion_percentage,
        isCompleted: row.is_completed,
        completedAt: row.completed_at,
        lastUpdatedAt: row.last_updated_at,
      });
    } catch (error) {
      return this.fail('Failed to load lesson progress', error, { userId, lessonId });
    }
  }

  async saveLessonProgress(progress: LessonProgress): StoreResult<void> {
    try {
      const values = {
        watched_seconds: progress.watchedSeconds,
        last_position_seconds: progress.lastPositionSeconds,
        completion_percentage: progress.completionPercentage,
        is_completed: progress.isCompleted,
        completed_at: progress.completedAt,
        last_updated_at: progress.lastUpdatedAt,
      };

      await this.db
        .insertInto('lessonprogress')
        .values({ user_id: progress.userId, lesson_id: progress.lessonId, ...values })
        .onConflict((oc) => oc.columns(['user_id', 'lesson_id']).doUpdateSet(values))
        .execute();

      return ok(undefined);
    } catch (error) {
      return this.fail('Failed to save lesson progress', error, {
        userId: progress.userId,
        lessonId: progress.lessonId,
      });
    }
  }

  async getProgressTotals(userId: string, lessonIds?: readonly string[]): StoreResult<ProgressTotals> {
    if (lessonIds?.length === 0) {
      return ok({ completedLessons: 0, watchedSeconds: 0 });
    }

    try {
      let query = this.db
        .selectFrom('lessonprogress')
        .select([
          sql<string>`count(*) filter (where is_completed)`.as('completed_lessons'),
          sql<string>`coalesce(sum(watched_seconds), 0)`.as('watched_seconds'),
        ])
        .where('user_id', '=', userId);

      if (lessonIds !== undefined) {
        query = query.where('lesson_id', 'in', [...lessonIds]);
      }

      const row = await query.executeTakeFirst();

      return ok({
        completedLessons: Number(row?.completed_lessons ?? 0),
        watchedSeconds: Number(row?.watched_seconds ?? 0),
      });
    } catch (error) {
      return this.fail('Failed to aggregate lesson progress', error, { userId });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Points Ledger
  // ─────────────────────────────────────────────────────────────────────────

  async findPointsEntry(
    userId: string,
    referenceType: ReferenceType,
    referenceId: string
  ): StoreResult<PointsEntry | null> {
    try {
      const row = await this.db
        .selectFrom('pointshistory')
        .selectAll()
        .where('user_id', '=', userId)
        .where('reference_type', '=', referenceType)
        .where('reference_id', '=', referenceId)
        .executeTakeFirst();

      return row === undefined ? ok(null) : this.mapPointsEntry(row);
    } catch (error) {
      return this.fail('Failed to load points entry', error, { userId, referenceType, referenceId });
    }
  }

  async insertPointsEntry(entry: NewPointsEntry): StoreResult<InsertOutcome<PointsEntry>> {
    try {
      const row = await this.db
        .insertInto('pointshistory')
        .values({
          user_id: entry.userId,
          points: entry.points,
          reason: entry.reason,
          reference_type: entry.referenceType,
          reference_id: entry.referenceId,
          note: entry.note,
          created_at: entry.createdAt,
        })
        .onConflict((oc) =>
          oc
            .columns(['user_id', 'reference_type', 'reference_id'])
            .where('reference_id', 'is not', null)
            .doNothing()
        )
        .returningAll()
        .executeTakeFirst();

      if (row !== undefined) {
        const mapped = this.mapPointsEntry(row);
        return mapped.map((inserted) => ({ entry: inserted, inserted: true }));
      }

      if (entry.referenceId === null) {
        return err(createStoreUnavailableError('Points entry insert returned no row'));
      }

      const existing = await this.findPointsEntry(entry.userId, entry.referenceType, entry.referenceId);
      if (existing.isErr()) {
        return err(existing.error);
      }
      if (existing.value === null) {
        return err(
          createConcurrencyConflictError('Points entry key is held by an uncommitted transaction')
        );
      }

      return ok({ entry: existing.value, inserted: false });
    } catch (error) {
      return this.fail('Failed to insert points entry', error, {
        userId: entry.userId,
        reason: entry.reason,
      });
    }
  }

  async countPointsEntries(userId: string, reason: PointsReason): StoreResult<number> {
    try {
      const row = await this.db
        .selectFrom('pointshistory')
        .select(sql<string>`count(*)`.as('count'))
        .where('user_id', '=', userId)
        .where('reason', '=', reason)
        .executeTakeFirst();

      return ok(Number(row?.count ?? 0));
    } catch (error) {
      return this.fail('Failed to count points entries', error, { userId, reason });
    }
  }

  async listPointsEntries(userId: string, limit: number): StoreResult<PointsEntry[]> {
    try {
      const rows = await this.db
        .selectFrom('pointshistory')
        .selectAll()
        .where('user_id', '=', userId)
        .orderBy('created_at', 'desc')
        .orderBy('id', 'desc')
        .limit(limit)
        .execute();

      return Result.combine(rows.map((row) => this.mapPointsEntry(row)));
    } catch (error) {
      return this.fail('Failed to list points entries', error, { userId });
    }
  }

  async findUserPoints(userId: string): StoreResult<UserPoints | null> {
    try {
      const row = await this.db
        .selectFrom('userpoints')
        .selectAll()
        .where('user_id', '=', userId)
        .executeTakeFirst();

      return ok(row === undefined ? null : this.mapUserPoints(row));
    } catch (error) {
      return this.fail('Failed to load user points', error, { userId });
    }
  }

  async saveUserPoints(points: UserPoints): StoreResult<void> {
    try {
      const values = {
        total_points: points.totalPoints,
        level: points.level,
        points_to_next_level: points.pointsToNextLevel,
        last_recomputed_at: points.lastRecomputedAt,
      };

      await this.db
        .insertInto('userpoints')
        .values({ user_id: points.userId, ...values })
        .onConflict((oc) => oc.column('user_id').doUpdateSet(values))
        .execute();

      return ok(undefined);
    } catch (error) {
      return this.fail('Failed to save user points', error, { userId: points.userId });
    }
  }

  async listTopUserPoints(limit: number): StoreResult<UserPoints[]> {
    try {
      const rows = await this.db
        .selectFrom('userpoints')
        .selectAll()
        .orderBy('total_points', 'desc')
        .orderBy('user_id', 'asc')
        .limit(limit)
        .execute();

      return ok(rows.map((row) => this.mapUserPoints(row)));
    } catch (error) {
      return this.fail('Failed to list top user points', error, { limit });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Streaks
  // ─────────────────────────────────────────────────────────────────────────

  async findUserStreak(userId: string): StoreResult<UserStreak | null> {
    try {
      let query = this.db
        .selectFrom('userstreaks')
        .select([
          'user_id',
          'current_streak',
          'longest_streak',
          sql<string>`last_activity_date::text`.as('last_activity_date'),
          'grace_period_used_at',
        ])
        .where('user_id', '=', userId);

      if (this.lockRows) {
        query = query.forUpdate();
      }

      const row = await query.executeTakeFirst();
      if (row === undefined) {
        return ok(null);
      }

      return ok({
        userId: row.user_id,
        currentStreak: row.current_streak,
        longestStreak: row.longest_streak,
        lastActivityDate: row.last_activity_date,
        gracePeriodUsedAt: row.grace_period_used_at,
      });
    } catch (error) {
      return this.fail('Failed to load user streak', error, { userId });
    }
  }

  async saveUserStreak(streak: UserStreak): StoreResult<void> {
    try {
      const values = {
        current_streak: streak.currentStreak,
        longest_streak: streak.longestStreak,
        last_activity_date: streak.lastActivityDate,
        grace_period_used_at: streak.gracePeriodUsedAt,
      };

      await this.db
        .insertInto('userstreaks')
        .values({ user_id: streak.userId, ...values })
        .onConflict((oc) =>
          oc.column('user_id').doUpdateSet({ ...values, updated_at: sql`now()` })
        )
        .execute();

      return ok(undefined);
    } catch (error) {
      return this.fail('Failed to save user streak', error, { userId: streak.userId });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Achievements
  // ─────────────────────────────────────────────────────────────────────────

  async listActiveAchievements(): StoreResult<Achievement[]> {
    try {
      const rows = await this.db
        .selectFrom('achievements')
        .select([
          'id',
          'code',
          'title',
          'description',
          'icon',
          'category',
          'trigger_kind',
          'trigger_threshold',
          'points_reward',
          'sort_order',
          'is_active',
        ])
        .where('is_active', '=', true)
        .orderBy('sort_order', 'asc')
        .orderBy('code', 'asc')
        .execute();

      return ok(this.mapAchievements(rows));
    } catch (error) {
      return this.fail('Failed to list achievements', error, {});
    }
  }

  async listEarnedAchievements(userId: string): StoreResult<EarnedAchievement[]> {
    try {
      const rows = await this.db
        .selectFrom('userachievements as ua')
        .innerJoin('achievements as a', 'a.id', 'ua.achievement_id')
        .select([
          'ua.earned_at',
          'ua.progress_value',
          'a.id',
          'a.code',
          'a.title',
          'a.description',
          'a.icon',
          'a.category',
          'a.trigger_kind',
          'a.trigger_threshold',
          'a.points_reward',
          'a.sort_order',
          'a.is_active',
        ])
        .where('ua.user_id', '=', userId)
        .orderBy('ua.earned_at', 'desc')
        .orderBy('ua.id', 'desc')
        .execute();

      const earned: EarnedAchievement[] = [];
      for (const row of rows) {
        const [achievement] = this.mapAchievements([row]);
        if (achievement === undefined) {
          continue;
        }
        earned.push({
          userId,
          achievementId: achievement.id,
          earnedAt: row.earned_at,
          progressValue: toProgressValue(row.progress_value),
          achievement,
        });
      }

      return ok(earned);
    } catch (error) {
      return this.fail('Failed to list earned achievements', error, { userId });
    }
  }

  async insertUserAchievement(
    achievement: UserAchievement
  ): StoreResult<InsertOutcome<UserAchievement>> {
    try {
      const row = await this.db
        .insertInto('userachievements')
        .values({
          user_id: achievement.userId,
          achievement_id: achievement.achievementId,
          earned_at: achievement.earnedAt,
          progress_value: achievement.progressValue,
        })
        .onConflict((oc) => oc.columns(['user_id', 'achievement_id']).doNothing())
        .returning(['user_id', 'achievement_id', 'earned_at', 'progress_value'])
        .executeTakeFirst();

      if (row !== undefined) {
        return ok({ entry: achievement, inserted: true });
      }

      const existing = await this.db
        .selectFrom('userachievements')
        .select(['earned_at', 'progress_value'])
        .where('user_id', '=', achievement.userId)
        .where('achievement_id', '=', achievement.achievementId)
        .executeTakeFirst();

      if (existing === undefined) {
        return err(
          createConcurrencyConflictError('Achievement grant is held by an uncommitted transaction')
        );
      }

      return ok({
        entry: {
          userId: achievement.userId,
          achievementId: achievement.achievementId,
          earnedAt: existing.earned_at,
          progressValue: toProgressValue(existing.progress_value),
        },
        inserted: false,
      });
    } catch (error) {
      return this.fail('Failed to insert user achievement', error, {
        userId: achievement.userId,
        achievementId: achievement.achievementId,
      });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private fail<T>(
    message: string,
    error: unknown,
    context: Record<string, unknown>
  ): Result<T, GamificationError> {
    const mapped = toStoreError(message, error);
    if (mapped.type === 'ConcurrencyConflictError') {
      this.log.debug({ err: error, ...context }, message);
    } else {
      this.log.error({ err: error, ...context }, message);
    }
    return err(mapped);
  }

  private mapPointsEntry(row: PointsHistoryRow): Result<PointsEntry, GamificationError> {
    const { reason, reference_type: referenceType } = row;
    if (!isPointsReason(reason) || !isReferenceType(referenceType)) {
      return err(createStoreUnavailableError(`Unexpected points entry row ${row.id}`));
    }

    return ok({
      id: row.id,
      userId: row.user_id,
      points: row.points,
      reason,
      referenceType,
      referenceId: row.reference_id,
      note: row.note,
      createdAt: row.created_at,
    });
  }

  private mapUserPoints(row: {
    user_id: string;
    total_points: number;
    level: number;
    points_to_next_level: number;
    last_recomputed_at: Date;
  }): UserPoints {
    return {
      userId: row.user_id,
      totalPoints: row.total_points,
      level: row.level,
      pointsToNextLevel: row.points_to_next_level,
      lastRecomputedAt: row.last_recomputed_at,
    };
  }

  /**
   * Maps catalog rows, skipping any with a trigger kind this build does not know.
   */
  private mapAchievements(rows: AchievementRow[]): Achievement[] {
    const achievements: Achievement[] = [];

    for (const row of rows) {
      const trigger = buildAchievementTrigger(row.trigger_kind, row.trigger_threshold);
      if (trigger === null) {
        this.log.warn({ code: row.code, triggerKind: row.trigger_kind }, 'Skipping achievement with unknown trigger');
        continue;
      }

      achievements.push({
        id: row.id,
        code: row.code,
        title: row.title,
        description: row.description,
        icon: row.icon,
        category: row.category,
        trigger,
        pointsReward: row.points_reward,
        sortOrder: row.sort_order,
        isActive: row.is_active,
      });
    }

    return achievements;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

class KyselyGamificationStore implements GamificationStore {
  private readonly db: DbClient;
  private readonly log: Logger;

  constructor(options: GamificationStoreOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'gamification-store' });
  }

  async transaction<T>(
    work: (tx: GamificationTx) => Promise<Result<T, GamificationError>>
  ): Promise<Result<T, GamificationError>> {
    try {
      const value = await this.db
        .transaction()
        .setIsolationLevel('serializable')
        .execute(async (trx) => {
          const result = await work(new KyselyGamificationTx(trx, this.log, true));
          if (result.isErr()) {
            throw new RollbackSignal(result.error);
          }
          return result.value;
        });

      return ok(value);
    } catch (error) {
      if (error instanceof RollbackSignal) {
        return err(error.error);
      }

      // Serialization failures can also surface on COMMIT
      const mapped = toStoreError('Gamification transaction failed', error);
      if (mapped.type === 'StoreUnavailableError') {
        this.log.error({ err: error }, 'Gamification transaction failed');
      }
      return err(mapped);
    }
  }

  async read<T>(
    work: (tx: GamificationTx) => Promise<Result<T, GamificationError>>
  ): Promise<Result<T, GamificationError>> {
    return work(new KyselyGamificationTx(this.db, this.log, false));
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the PostgreSQL-backed gamification store.
 */
export const makeGamificationStore = (options: GamificationStoreOptions): GamificationStore => {
  return new KyselyGamificationStore(options);
};
