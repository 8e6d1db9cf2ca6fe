/**
 * Read-side Use Case Tests
 *
 * Snapshot, course progress, achievements, points history and leaderboard.
 */

import { describe, it, expect } from 'vitest';

import { getCourseProgress, courseCompletionSignal } from '@/modules/gamification/core/usecases/get-course-progress.js';
import { getLeaderboard } from '@/modules/gamification/core/usecases/get-leaderboard.js';
import { getSnapshot } from '@/modules/gamification/core/usecases/get-snapshot.js';
import {
  listAchievements,
  listEarnedAchievements,
} from '@/modules/gamification/core/usecases/list-achievements.js';
import { listPointsHistory } from '@/modules/gamification/core/usecases/list-points-history.js';
import { recordActivity, type ActivityDeps } from '@/modules/gamification/core/usecases/record-activity.js';

import { makeAchievement, makeLessonProgress, makeStreak } from '../../fixtures/builders.js';
import {
  makeFakeClock,
  makeFakeCourseCatalog,
  makeFakeGamificationStore,
  makeSilentLogger,
} from '../../fixtures/fakes.js';

import type { UserPoints } from '@/modules/gamification/core/types.js';

const NOW = new Date('2024-03-10T12:00:00Z');

const points = (userId: string, totalPoints: number): UserPoints => ({
  userId,
  totalPoints,
  level: 1,
  pointsToNextLevel: 0,
  lastRecomputedAt: NOW,
});

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot
// ─────────────────────────────────────────────────────────────────────────────

describe('getSnapshot', () => {
  it('returns zeroed defaults for a new user without writing', async () => {
    const store = makeFakeGamificationStore({
      achievements: [
        makeAchievement({ kind: 'lesson_count', lessons: 1 }),
        makeAchievement({ kind: 'streak_length', days: 3 }),
        makeAchievement({ kind: 'streak_length', days: 7 }, { isActive: false }),
      ],
    });

    const result = await getSnapshot(
      { store, clock: makeFakeClock(NOW), activityTimeZone: 'UTC' },
      { userId: 'new-user' }
    );

    expect(result._unsafeUnwrap()).toEqual({
      userId: 'new-user',
      totalPoints: 0,
      level: 1,
      pointsToNextLevel: 100,
      currentStreak: 0,
      longestStreak: 0,
      lastActivityDate: null,
      graceAvailable: true,
      daysUntilGraceAvailable: 0,
      recentAchievements: [],
      totalAchievementsEarned: 0,
      totalAchievementsAvailable: 2,
    });
    expect(store.attempts()).toBe(0);
    expect(store.pointsFor('new-user')).toBeUndefined();
  });

  it('reports streak, grace and the three most recent achievements', async () => {
    const catalog = [1, 2, 3, 4].map((lessons) =>
      makeAchievement({ kind: 'lesson_count', lessons })
    );
    const store = makeFakeGamificationStore({
      achievements: catalog,
      streaks: [
        makeStreak({
          currentStreak: 4,
          longestStreak: 9,
          lastActivityDate: '2024-03-10',
          gracePeriodUsedAt: new Date('2024-03-05T12:00:00Z'),
        }),
      ],
    });
    const deps: ActivityDeps = {
      store,
      catalog: makeFakeCourseCatalog({ courses: { c: ['l1', 'l2', 'l3', 'l4'] } }),
      clock: makeFakeClock(NOW),
      logger: makeSilentLogger(),
      activityTimeZone: 'UTC',
      maxConflictRetries: 3,
    };

    for (const lessonId of ['l1', 'l2', 'l3', 'l4']) {
      await recordActivity(deps, {
        userId: 'user-1',
        lessonId,
        watchedSeconds: 100,
        lastPositionSeconds: 100,
        completionPercentage: 100,
      });
    }

    const snapshot = (
      await getSnapshot({ store, clock: deps.clock, activityTimeZone: 'UTC' }, { userId: 'user-1' })
    )._unsafeUnwrap();

    // 4 lessons + course bonus
    expect(snapshot.totalPoints).toBe(140);
    expect(snapshot.level).toBe(2);
    expect(snapshot.currentStreak).toBe(4);
    expect(snapshot.longestStreak).toBe(9);
    expect(snapshot.graceAvailable).toBe(false);
    expect(snapshot.daysUntilGraceAvailable).toBe(25);
    expect(snapshot.totalAchievementsEarned).toBe(4);
    expect(snapshot.recentAchievements.map((e) => e.achievement.id)).toEqual([
      catalog[3]?.id,
      catalog[2]?.id,
      catalog[1]?.id,
    ]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Course Progress
// ─────────────────────────────────────────────────────────────────────────────

describe('getCourseProgress', () => {
  const catalog = makeFakeCourseCatalog({
    courses: { 'course-1': ['lesson-1', 'lesson-2', 'lesson-3'], empty: [] },
  });
  const store = makeFakeGamificationStore({
    progress: [
      makeLessonProgress({ lessonId: 'lesson-1', watchedSeconds: 100, completionPercentage: 100, isCompleted: true, completedAt: NOW }),
      makeLessonProgress({ lessonId: 'lesson-2', watchedSeconds: 50, completionPercentage: 30 }),
      makeLessonProgress({ lessonId: 'other-course-lesson', watchedSeconds: 999, completionPercentage: 100, isCompleted: true, completedAt: NOW }),
    ],
  });

  it('summarizes the lessons of the course only', async () => {
    const result = await getCourseProgress({ store, catalog }, { userId: 'user-1', courseId: 'course-1' });

    expect(result._unsafeUnwrap()).toEqual({
      courseId: 'course-1',
      totalLessons: 3,
      completedLessons: 1,
      progressPercentage: 33,
      totalWatchTimeSeconds: 150,
      isCompleted: false,
    });
  });

  it('reports an empty course as 0% and not completed', async () => {
    const result = await getCourseProgress({ store, catalog }, { userId: 'user-1', courseId: 'empty' });

    expect(result._unsafeUnwrap()).toMatchObject({ totalLessons: 0, progressPercentage: 0, isCompleted: false });
    expect((await courseCompletionSignal({ store, catalog }, { userId: 'user-1', courseId: 'empty' }))._unsafeUnwrap()).toBe(false);
  });

  it('fails for an unknown course', async () => {
    const result = await getCourseProgress({ store, catalog }, { userId: 'user-1', courseId: 'missing' });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'NotFoundError', resource: 'course' });
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Achievements, History, Leaderboard
// ─────────────────────────────────────────────────────────────────────────────

describe('listAchievements', () => {
  it('lists active achievements in sort order', async () => {
    const later = makeAchievement({ kind: 'lesson_count', lessons: 5 }, { sortOrder: 20, code: 'b' });
    const first = makeAchievement({ kind: 'lesson_count', lessons: 1 }, { sortOrder: 10, code: 'a' });
    const retired = makeAchievement({ kind: 'lesson_count', lessons: 2 }, { isActive: false });
    const store = makeFakeGamificationStore({ achievements: [later, first, retired] });

    expect((await listAchievements({ store }))._unsafeUnwrap()).toEqual([first, later]);
    expect((await listEarnedAchievements({ store }, { userId: 'user-1' }))._unsafeUnwrap()).toEqual([]);
  });
});

describe('listPointsHistory', () => {
  it('returns the newest entries first, up to the limit', async () => {
    const store = makeFakeGamificationStore();
    await store.transaction(async (tx) => {
      for (const referenceId of ['a', 'b', 'c']) {
        await tx.insertPointsEntry({
          userId: 'user-1',
          points: 1,
          reason: 'manual_adjustment',
          referenceType: 'adjustment',
          referenceId,
          note: null,
          createdAt: NOW,
        });
      }
      return tx.findUserPoints('user-1');
    });

    const result = await listPointsHistory({ store }, { userId: 'user-1', limit: 2 });

    expect(result._unsafeUnwrap().map((e) => e.referenceId)).toEqual(['c', 'b']);
  });

  it('rejects a limit outside 1..200', async () => {
    const store = makeFakeGamificationStore();

    expect((await listPointsHistory({ store }, { userId: 'u', limit: 0 }))._unsafeUnwrapErr().type).toBe('InvalidInputError');
    expect((await listPointsHistory({ store }, { userId: 'u', limit: 201 }))._unsafeUnwrapErr().type).toBe('InvalidInputError');
  });
});

describe('getLeaderboard', () => {
  it('ranks users by total, ties by user id', async () => {
    const store = makeFakeGamificationStore({
      userPoints: [points('carol', 50), points('bob', 320), points('alice', 320), points('dave', 5)],
    });

    const result = await getLeaderboard({ store }, { limit: 3 });

    expect(result._unsafeUnwrap()).toEqual([
      { rank: 1, userId: 'alice', totalPoints: 320, level: 3 },
      { rank: 2, userId: 'bob', totalPoints: 320, level: 3 },
      { rank: 3, userId: 'carol', totalPoints: 50, level: 1 },
    ]);
  });

  it('rejects a limit above 100', async () => {
    const store = makeFakeGamificationStore();

    const result = await getLeaderboard({ store }, { limit: 101 });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'InvalidInputError', field: 'limit' });
  });
});
