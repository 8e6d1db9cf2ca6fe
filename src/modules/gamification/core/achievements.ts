/**
 * Achievement Evaluator
 *
 * Rule data lives in the achievement catalog as tagged triggers; this module only
 * measures aggregates and compares them. Each achievement is granted at most once
 * per user, together with its point reward.
 */

import { ok, err, type Result } from 'neverthrow';

import { awardPoints } from './ledger.js';

import type { GamificationError } from './errors.js';
import type { GamificationTx } from './ports.js';
import type {
  Achievement,
  AchievementStats,
  AchievementTrigger,
  AchievementTriggerKind,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Trigger Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds a trigger from its stored (kind, threshold) pair.
 * Returns null for an unknown kind.
 */
export function buildAchievementTrigger(kind: string, threshold: number): AchievementTrigger | null {
  switch (kind) {
    case 'streak_length':
      return { kind, days: threshold };
    case 'lesson_count':
      return { kind, lessons: threshold };
    case 'watch_time_total':
      return { kind, seconds: threshold };
    case 'course_count':
      return { kind, courses: threshold };
    case 'points_total':
      return { kind, points: threshold };
    default:
      return null;
  }
}

export function triggerThreshold(trigger: AchievementTrigger): number {
  switch (trigger.kind) {
    case 'streak_length':
      return trigger.days;
    case 'lesson_count':
      return trigger.lessons;
    case 'watch_time_total':
      return trigger.seconds;
    case 'course_count':
      return trigger.courses;
    case 'points_total':
      return trigger.points;
  }
}

const STAT_BY_KIND: Record<AchievementTriggerKind, keyof AchievementStats> = {
  streak_length: 'currentStreak',
  lesson_count: 'completedLessons',
  watch_time_total: 'watchTimeSeconds',
  course_count: 'completedCourses',
  points_total: 'totalPoints',
};

/**
 * The aggregate a trigger is measured against.
 */
export function measureTrigger(trigger: AchievementTrigger, stats: AchievementStats): number {
  return stats[STAT_BY_KIND[trigger.kind]];
}

// ─────────────────────────────────────────────────────────────────────────────
// Pure Evaluation
// ─────────────────────────────────────────────────────────────────────────────

export interface UnlockCandidate {
  achievement: Achievement;
  progressValue: number;
}

/**
 * Active, not yet earned achievements whose trigger holds, in catalog order.
 */
export function findUnlockable(
  catalog: readonly Achievement[],
  earnedIds: ReadonlySet<string>,
  stats: AchievementStats
): UnlockCandidate[] {
  const candidates: UnlockCandidate[] = [];

  for (const achievement of catalog) {
    if (!achievement.isActive || earnedIds.has(achievement.id)) {
      continue;
    }

    const value = measureTrigger(achievement.trigger, stats);
    if (value >= triggerThreshold(achievement.trigger)) {
      candidates.push({ achievement, progressValue: value });
    }
  }

  return candidates;
}

// ─────────────────────────────────────────────────────────────────────────────
// Store Operations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reads every aggregate that triggers can refer to.
 */
export async function loadAchievementStats(
  tx: GamificationTx,
  userId: string
): Promise<Result<AchievementStats, GamificationError>> {
  const totalsResult = await tx.getProgressTotals(userId);
  if (totalsResult.isErr()) {
    return err(totalsResult.error);
  }

  const streakResult = await tx.findUserStreak(userId);
  if (streakResult.isErr()) {
    return err(streakResult.error);
  }

  const coursesResult = await tx.countPointsEntries(userId, 'course_completed');
  if (coursesResult.isErr()) {
    return err(coursesResult.error);
  }

  const pointsResult = await tx.findUserPoints(userId);
  if (pointsResult.isErr()) {
    return err(pointsResult.error);
  }

  return ok({
    currentStreak: streakResult.value?.currentStreak ?? 0,
    completedLessons: totalsResult.value.completedLessons,
    watchTimeSeconds: totalsResult.value.watchedSeconds,
    completedCourses: coursesResult.value,
    totalPoints: pointsResult.value?.totalPoints ?? 0,
  });
}

/**
 * Grants every newly satisfied achievement and awards its points.
 *
 * Rewards can satisfy `points_total` triggers, so passes repeat until one unlocks
 * nothing. Each pass earns at least one catalog entry, which bounds the loop.
 * Running it again on unchanged state unlocks nothing.
 */
export async function evaluateAchievements(
  tx: GamificationTx,
  userId: string,
  now: Date
): Promise<Result<Achievement[], GamificationError>> {
  const catalogResult = await tx.listActiveAchievements();
  if (catalogResult.isErr()) {
    return err(catalogResult.error);
  }

  const earnedResult = await tx.listEarnedAchievements(userId);
  if (earnedResult.isErr()) {
    return err(earnedResult.error);
  }

  const statsResult = await loadAchievementStats(tx, userId);
  if (statsResult.isErr()) {
    return err(statsResult.error);
  }

  const earnedIds = new Set(earnedResult.value.map((earned) => earned.achievementId));
  let stats = statsResult.value;
  const unlocked: Achievement[] = [];

  for (;;) {
    const candidates = findUnlockable(catalogResult.value, earnedIds, stats);
    if (candidates.length === 0) {
      break;
    }

    for (const { achievement, progressValue } of candidates) {
      earnedIds.add(achievement.id);

      const insertResult = await tx.insertUserAchievement({
        userId,
        achievementId: achievement.id,
        earnedAt: now,
        progressValue,
      });
      if (insertResult.isErr()) {
        return err(insertResult.error);
      }
      if (!insertResult.value.inserted) {
        continue;
      }

      const awardResult = await awardPoints(
        tx,
        {
          userId,
          points: achievement.pointsReward,
          reason: 'achievement_unlocked',
          referenceId: achievement.id,
          note: achievement.code,
        },
        now
      );
      if (awardResult.isErr()) {
        return err(awardResult.error);
      }

      stats = { ...stats, totalPoints: awardResult.value.userPoints.totalPoints };
      unlocked.push(achievement);
    }
  }

  return ok(unlocked);
}
