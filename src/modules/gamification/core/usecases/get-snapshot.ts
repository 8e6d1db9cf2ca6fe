/**
 * Get Snapshot Use Case
 *
 * Read-only view of a user's points, level, streak and achievements.
 */

import { ok, err, type Result } from 'neverthrow';

import { levelFor } from '../levels.js';
import { graceStatus, toActivityDate } from '../streak.js';
import { RECENT_ACHIEVEMENTS_LIMIT, type GamificationSnapshot } from '../types.js';

import type { GamificationError } from '../errors.js';
import type { Clock, GamificationStore } from '../ports.js';

export interface GetSnapshotDeps {
  store: GamificationStore;
  clock: Clock;
  activityTimeZone: string;
}

export interface GetSnapshotInput {
  userId: string;
}

/**
 * Builds the snapshot. Users without any rows get zeroed defaults; nothing is written.
 */
export async function getSnapshot(
  deps: GetSnapshotDeps,
  input: GetSnapshotInput
): Promise<Result<GamificationSnapshot, GamificationError>> {
  const { store, clock, activityTimeZone } = deps;
  const { userId } = input;

  return store.read(async (tx) => {
    const pointsResult = await tx.findUserPoints(userId);
    if (pointsResult.isErr()) {
      return err(pointsResult.error);
    }

    const streakResult = await tx.findUserStreak(userId);
    if (streakResult.isErr()) {
      return err(streakResult.error);
    }

    const earnedResult = await tx.listEarnedAchievements(userId);
    if (earnedResult.isErr()) {
      return err(earnedResult.error);
    }

    const catalogResult = await tx.listActiveAchievements();
    if (catalogResult.isErr()) {
      return err(catalogResult.error);
    }

    const totalPoints = pointsResult.value?.totalPoints ?? 0;
    const { level, pointsToNextLevel } = levelFor(totalPoints);
    const streak = streakResult.value;
    const grace = graceStatus(streak, toActivityDate(clock.now(), activityTimeZone), activityTimeZone);

    return ok({
      userId,
      totalPoints,
      level,
      pointsToNextLevel,
      currentStreak: streak?.currentStreak ?? 0,
      longestStreak: streak?.longestStreak ?? 0,
      lastActivityDate: streak?.lastActivityDate ?? null,
      graceAvailable: grace.graceAvailable,
      daysUntilGraceAvailable: grace.daysUntilGraceAvailable,
      recentAchievements: earnedResult.value.slice(0, RECENT_ACHIEVEMENTS_LIMIT),
      totalAchievementsEarned: earnedResult.value.length,
      totalAchievementsAvailable: catalogResult.value.length,
    });
  });
}
