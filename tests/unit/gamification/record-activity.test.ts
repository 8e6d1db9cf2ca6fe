/**
 * Record Activity Use Case Tests
 */

import { describe, it, expect } from 'vitest';

import { createConcurrencyConflictError } from '@/modules/gamification/core/errors.js';
import {
  recordActivity,
  type ActivityDeps,
} from '@/modules/gamification/core/usecases/record-activity.js';

import { makeAchievement, makeLessonProgress, makeStreak } from '../../fixtures/builders.js';
import {
  makeFakeClock,
  makeFakeCourseCatalog,
  makeFakeGamificationStore,
  makeSilentLogger,
  type FakeClock,
  type FakeGamificationStore,
  type FakeGamificationStoreOptions,
} from '../../fixtures/fakes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

interface TestContext {
  deps: ActivityDeps;
  store: FakeGamificationStore;
  clock: FakeClock;
}

const setup = (storeOptions: FakeGamificationStoreOptions = {}): TestContext => {
  const store = makeFakeGamificationStore(storeOptions);
  const clock = makeFakeClock('2024-03-01T12:00:00Z');
  const catalog = makeFakeCourseCatalog({
    courses: { 'course-1': ['lesson-1', 'lesson-2'] },
  });

  return {
    store,
    clock,
    deps: {
      store,
      catalog,
      clock,
      logger: makeSilentLogger(),
      activityTimeZone: 'UTC',
      maxConflictRetries: 3,
    },
  };
};

const watch = (
  deps: ActivityDeps,
  lessonId: string,
  completionPercentage: number,
  watchedSeconds = 120
) =>
  recordActivity(deps, {
    userId: 'user-1',
    lessonId,
    watchedSeconds,
    lastPositionSeconds: watchedSeconds,
    completionPercentage,
  });

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('recordActivity', () => {
  it('stores partial progress without awards', async () => {
    const { deps, store } = setup();

    const result = await watch(deps, 'lesson-1', 40, 30);

    const snapshot = result._unsafeUnwrap();
    expect(snapshot.completionTransition).toBe(false);
    expect(snapshot.courseCompleted).toBe(false);
    expect(snapshot.totalPoints).toBe(0);
    expect(snapshot.level).toBe(1);
    expect(snapshot.pointsToNextLevel).toBe(100);
    expect(snapshot.progress.completionPercentage).toBe(40);
    expect(store.ledgerFor('user-1')).toEqual([]);
  });

  it('counts a minute of watch time as streak activity', async () => {
    const { deps, store } = setup();

    const short = await watch(deps, 'lesson-1', 10, 59);
    expect(short._unsafeUnwrap().currentStreak).toBe(0);
    expect(store.streakFor('user-1')).toBeUndefined();

    const long = await watch(deps, 'lesson-1', 20, 60);
    expect(long._unsafeUnwrap().currentStreak).toBe(1);
    expect(store.streakFor('user-1')?.lastActivityDate).toBe('2024-03-01');
  });

  it('counts a short rewatch of a completed lesson as streak activity', async () => {
    const { deps, store } = setup({
      progress: [
        makeLessonProgress({
          completionPercentage: 100,
          watchedSeconds: 300,
          isCompleted: true,
          completedAt: new Date('2024-02-29T10:00:00Z'),
        }),
      ],
      streaks: [makeStreak({ lastActivityDate: '2024-02-29' })],
    });

    const snapshot = (await watch(deps, 'lesson-1', 100, 10))._unsafeUnwrap();

    expect(snapshot.completionTransition).toBe(false);
    expect(snapshot.currentStreak).toBe(2);
    expect(store.streakFor('user-1')?.lastActivityDate).toBe('2024-03-01');
    expect(store.ledgerFor('user-1')).toEqual([]);
  });

  it('follows a week of activity with one grace day and a reset', async () => {
    const { deps, store, clock } = setup();
    const streaks: number[] = [];

    // Active on days 1, 2, 4, 5 and 8
    for (const gap of [0, 1, 2, 1, 3]) {
      clock.advanceDays(gap);
      const snapshot = (await watch(deps, 'lesson-1', 10, 60))._unsafeUnwrap();
      streaks.push(snapshot.currentStreak);
    }

    expect(streaks).toEqual([1, 2, 3, 4, 1]);
    expect(store.streakFor('user-1')).toEqual({
      userId: 'user-1',
      currentStreak: 1,
      longestStreak: 4,
      lastActivityDate: '2024-03-08',
      gracePeriodUsedAt: new Date('2024-03-04T12:00:00Z'),
    });
  });

  it('awards lesson points once when the threshold is reached', async () => {
    const { deps, store } = setup();

    const first = (await watch(deps, 'lesson-1', 95))._unsafeUnwrap();
    expect(first.completionTransition).toBe(true);
    expect(first.progress.isCompleted).toBe(true);
    expect(first.progress.completedAt).toEqual(new Date('2024-03-01T12:00:00Z'));
    expect(first.totalPoints).toBe(10);
    expect(first.pointsToNextLevel).toBe(90);
    expect(first.currentStreak).toBe(1);
    expect(first.graceAvailable).toBe(true);

    const second = (await watch(deps, 'lesson-1', 100))._unsafeUnwrap();
    expect(second.completionTransition).toBe(false);
    expect(second.totalPoints).toBe(10);

    expect(store.ledgerFor('user-1').map((e) => [e.reason, e.referenceId])).toEqual([
      ['lesson_completed', 'lesson-1'],
    ]);
  });

  it('awards the course bonus with the last lesson, once', async () => {
    const { deps, store } = setup();

    await watch(deps, 'lesson-1', 100);
    const last = (await watch(deps, 'lesson-2', 100))._unsafeUnwrap();

    expect(last.courseCompleted).toBe(true);
    expect(last.totalPoints).toBe(120);
    expect(last.level).toBe(2);

    const again = (await watch(deps, 'lesson-2', 100))._unsafeUnwrap();
    expect(again.courseCompleted).toBe(false);
    expect(again.totalPoints).toBe(120);

    expect(store.ledgerFor('user-1').map((e) => e.reason)).toEqual([
      'lesson_completed',
      'lesson_completed',
      'course_completed',
    ]);
  });

  it('extends the streak on consecutive days', async () => {
    const { deps, clock } = setup();

    await watch(deps, 'lesson-1', 10);
    clock.advanceDays(1);
    const snapshot = (await watch(deps, 'lesson-1', 20))._unsafeUnwrap();

    expect(snapshot.currentStreak).toBe(2);
    expect(snapshot.longestStreak).toBe(2);
  });

  it('reports achievements unlocked by the event', async () => {
    const firstLesson = makeAchievement({ kind: 'lesson_count', lessons: 1 }, { pointsReward: 10 });
    const { deps } = setup({ achievements: [firstLesson] });

    const snapshot = (await watch(deps, 'lesson-1', 100))._unsafeUnwrap();

    expect(snapshot.newlyUnlockedAchievements).toEqual([firstLesson]);
    expect(snapshot.totalPoints).toBe(20);

    const again = (await watch(deps, 'lesson-1', 100))._unsafeUnwrap();
    expect(again.newlyUnlockedAchievements).toEqual([]);
  });

  it('awards a lesson once under concurrent duplicate reports', async () => {
    const { deps, store } = setup();

    const results = await Promise.all([watch(deps, 'lesson-1', 100), watch(deps, 'lesson-1', 100)]);

    const transitions = results.map((r) => r._unsafeUnwrap().completionTransition);
    expect(transitions.filter(Boolean)).toHaveLength(1);
    expect(store.ledgerFor('user-1')).toHaveLength(1);
    expect(store.pointsFor('user-1')?.totalPoints).toBe(10);
  });

  it('retries a conflicting unit of work', async () => {
    const { deps, store } = setup({
      beforeCommit: (attempt) =>
        attempt === 1 ? createConcurrencyConflictError('serialization failure') : null,
    });

    const result = await watch(deps, 'lesson-1', 100);

    expect(result._unsafeUnwrap().totalPoints).toBe(10);
    expect(store.attempts()).toBe(2);
    expect(store.ledgerFor('user-1')).toHaveLength(1);
  });

  it('surfaces a conflict after the retry budget', async () => {
    const { deps, store } = setup({
      beforeCommit: () => createConcurrencyConflictError('serialization failure'),
    });

    const result = await watch(deps, 'lesson-1', 100);

    expect(result._unsafeUnwrapErr().type).toBe('ConcurrencyConflictError');
    expect(store.attempts()).toBe(3);
    expect(store.commits()).toBe(0);
    expect(store.progressFor('user-1', 'lesson-1')).toBeUndefined();
  });

  it('rejects an unknown lesson before touching the store', async () => {
    const { deps, store } = setup();

    const result = await watch(deps, 'lesson-404', 50);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'NotFoundError',
      resource: 'lesson',
      id: 'lesson-404',
    });
    expect(store.attempts()).toBe(0);
  });

  it('rejects negative seconds', async () => {
    const { deps, store } = setup();

    const result = await watch(deps, 'lesson-1', 50, -10);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'InvalidInputError',
      field: 'watchedSeconds',
    });
    expect(store.attempts()).toBe(0);
  });

  it('does not retry store failures', async () => {
    const { deps, store } = setup({ simulateDbError: true });

    const result = await watch(deps, 'lesson-1', 50);

    expect(result._unsafeUnwrapErr().type).toBe('StoreUnavailableError');
    expect(store.attempts()).toBe(1);
  });
});
