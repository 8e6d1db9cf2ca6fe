/**
 * Test fakes and mocks
 */

import { ok, err, type Result } from 'neverthrow';
import pinoLib, { type Logger } from 'pino';

import {
  createConcurrencyConflictError,
  createStoreUnavailableError,
  type GamificationError,
} from '@/modules/gamification/core/errors.js';

import type {
  Clock,
  CourseCatalog,
  EnrollmentChecker,
  GamificationStore,
  GamificationTx,
  InsertOutcome,
  ProgressTotals,
} from '@/modules/gamification/core/ports.js';
import type {
  Achievement,
  EarnedAchievement,
  LessonProgress,
  LessonRef,
  NewPointsEntry,
  PointsEntry,
  PointsReason,
  ReferenceType,
  UserAchievement,
  UserPoints,
  UserStreak,
} from '@/modules/gamification/core/types.js';

// =============================================================================
// Logger
// =============================================================================

export const makeSilentLogger = (): Logger => pinoLib({ level: 'silent' });

// =============================================================================
// Clock
// =============================================================================

export interface FakeClock extends Clock {
  set(instant: Date | string): void;
  advanceDays(days: number): void;
}

/**
 * Clock that only moves when told to.
 */
export const makeFakeClock = (initial: Date | string = '2024-03-01T12:00:00Z'): FakeClock => {
  let current = new Date(initial);

  return {
    now: () => new Date(current),
    set: (instant) => {
      current = new Date(instant);
    },
    advanceDays: (days) => {
      current = new Date(current.getTime() + days * 24 * 60 * 60 * 1000);
    },
  };
};

// =============================================================================
// Gamification Store
// =============================================================================

interface StoreState {
  progress: Map<string, LessonProgress>;
  ledger: PointsEntry[];
  nextEntryId: number;
  userPoints: Map<string, UserPoints>;
  streaks: Map<string, UserStreak>;
  earned: UserAchievement[];
}

export interface FakeGamificationStoreOptions {
  achievements?: Achievement[];
  progress?: LessonProgress[];
  streaks?: UserStreak[];
  userPoints?: UserPoints[];
  /** Consulted before each commit; a returned error aborts the transaction */
  beforeCommit?: (attempt: number) => GamificationError | null;
  /** Every store call fails with StoreUnavailableError */
  simulateDbError?: boolean;
}

export interface FakeGamificationStore extends GamificationStore {
  ledgerFor(userId: string): PointsEntry[];
  progressFor(userId: string, lessonId: string): LessonProgress | undefined;
  streakFor(userId: string): UserStreak | undefined;
  pointsFor(userId: string): UserPoints | undefined;
  earnedFor(userId: string): UserAchievement[];
  /** Number of transactions that committed */
  commits(): number;
  /** Number of transaction attempts, committed or not */
  attempts(): number;
}

const progressKey = (userId: string, lessonId: string): string => `${userId}:${lessonId}`;

const cloneState = (state: StoreState): StoreState => structuredClone(state);

/**
 * In-memory store with optimistic concurrency.
 *
 * Each transaction works on a private copy of the state. A transaction that wrote
 * something commits only if no other transaction committed since it started;
 * otherwise it fails with ConcurrencyConflictError, like a serialization failure.
 */
export const makeFakeGamificationStore = (
  options: FakeGamificationStoreOptions = {}
): FakeGamificationStore => {
  const catalog = [...(options.achievements ?? [])];
  const simulateDbError = options.simulateDbError ?? false;

  let state: StoreState = {
    progress: new Map((options.progress ?? []).map((p) => [progressKey(p.userId, p.lessonId), p])),
    ledger: [],
    nextEntryId: 1,
    userPoints: new Map((options.userPoints ?? []).map((p) => [p.userId, p])),
    streaks: new Map((options.streaks ?? []).map((s) => [s.userId, s])),
    earned: [],
  };
  let version = 0;
  let commitCount = 0;
  let attemptCount = 0;

  const dbError = (): Result<never, GamificationError> =>
    err(createStoreUnavailableError('Simulated database error'));

  const makeTx = (working: StoreState, markDirty: () => void): GamificationTx => {
    const write = <T>(apply: () => T): Promise<Result<T, GamificationError>> => {
      if (simulateDbError) return Promise.resolve(dbError());
      markDirty();
      return Promise.resolve(ok(apply()));
    };

    const read = <T>(get: () => T): Promise<Result<T, GamificationError>> => {
      if (simulateDbError) return Promise.resolve(dbError());
      return Promise.resolve(ok(get()));
    };

    const findEntry = (
      userId: string,
      referenceType: ReferenceType,
      referenceId: string
    ): PointsEntry | undefined =>
      working.ledger.find(
        (e) =>
          e.userId === userId && e.referenceType === referenceType && e.referenceId === referenceId
      );

    return {
      findLessonProgress: (userId, lessonId) =>
        read(() => working.progress.get(progressKey(userId, lessonId)) ?? null),

      saveLessonProgress: (progress) =>
        write(() => {
          working.progress.set(progressKey(progress.userId, progress.lessonId), { ...progress });
        }),

      getProgressTotals: (userId, lessonIds) =>
        read((): ProgressTotals => {
          const scope = lessonIds !== undefined ? new Set(lessonIds) : null;
          let completedLessons = 0;
          let watchedSeconds = 0;
          for (const p of working.progress.values()) {
            if (p.userId !== userId) continue;
            if (scope !== null && !scope.has(p.lessonId)) continue;
            if (p.isCompleted) completedLessons++;
            watchedSeconds += p.watchedSeconds;
          }
          return { completedLessons, watchedSeconds };
        }),

      findPointsEntry: (userId, referenceType, referenceId) =>
        read(() => findEntry(userId, referenceType, referenceId) ?? null),

      insertPointsEntry: (entry: NewPointsEntry) => {
        if (entry.referenceId !== null) {
          const existing = findEntry(entry.userId, entry.referenceType, entry.referenceId);
          if (existing !== undefined) {
            return read((): InsertOutcome<PointsEntry> => ({ entry: existing, inserted: false }));
          }
        }
        return write((): InsertOutcome<PointsEntry> => {
          const stored: PointsEntry = { ...entry, id: String(working.nextEntryId) };
          working.nextEntryId++;
          working.ledger.push(stored);
          return { entry: stored, inserted: true };
        });
      },

      countPointsEntries: (userId: string, reason: PointsReason) =>
        read(() => working.ledger.filter((e) => e.userId === userId && e.reason === reason).length),

      listPointsEntries: (userId, limit) =>
        read(() =>
          working.ledger
            .filter((e) => e.userId === userId)
            .reverse()
            .slice(0, limit)
        ),

      findUserPoints: (userId) => read(() => working.userPoints.get(userId) ?? null),

      saveUserPoints: (points) =>
        write(() => {
          working.userPoints.set(points.userId, { ...points });
        }),

      listTopUserPoints: (limit) =>
        read(() =>
          [...working.userPoints.values()]
            .sort((a, b) =>
              b.totalPoints !== a.totalPoints
                ? b.totalPoints - a.totalPoints
                : a.userId.localeCompare(b.userId)
            )
            .slice(0, limit)
        ),

      findUserStreak: (userId) => read(() => working.streaks.get(userId) ?? null),

      saveUserStreak: (streak) =>
        write(() => {
          working.streaks.set(streak.userId, { ...streak });
        }),

      listActiveAchievements: () =>
        read(() =>
          catalog
            .filter((a) => a.isActive)
            .sort((a, b) =>
              a.sortOrder !== b.sortOrder ? a.sortOrder - b.sortOrder : a.code.localeCompare(b.code)
            )
        ),

      listEarnedAchievements: (userId) =>
        read(() => {
          const earned: EarnedAchievement[] = [];
          // Insertion order reversed gives newest first for equal timestamps
          for (const ua of [...working.earned].reverse()) {
            if (ua.userId !== userId) continue;
            const achievement = catalog.find((a) => a.id === ua.achievementId);
            if (achievement !== undefined) {
              earned.push({ ...ua, achievement });
            }
          }
          return earned.sort((a, b) => b.earnedAt.getTime() - a.earnedAt.getTime());
        }),

      insertUserAchievement: (achievement) => {
        const existing = working.earned.find(
          (ua) => ua.userId === achievement.userId && ua.achievementId === achievement.achievementId
        );
        if (existing !== undefined) {
          return read(
            (): InsertOutcome<UserAchievement> => ({ entry: existing, inserted: false })
          );
        }
        return write((): InsertOutcome<UserAchievement> => {
          working.earned.push({ ...achievement });
          return { entry: achievement, inserted: true };
        });
      },
    };
  };

  return {
    async transaction<T>(
      work: (tx: GamificationTx) => Promise<Result<T, GamificationError>>
    ): Promise<Result<T, GamificationError>> {
      attemptCount++;
      const attempt = attemptCount;
      const startVersion = version;
      const working = cloneState(state);
      let dirty = false;

      const result = await work(
        makeTx(working, () => {
          dirty = true;
        })
      );
      if (result.isErr()) {
        return result;
      }

      const injected = options.beforeCommit?.(attempt) ?? null;
      if (injected !== null) {
        return err(injected);
      }

      if (dirty) {
        if (version !== startVersion) {
          return err(createConcurrencyConflictError('Simulated serialization failure'));
        }
        state = working;
        version++;
      }

      commitCount++;
      return result;
    },

    read<T>(
      work: (tx: GamificationTx) => Promise<Result<T, GamificationError>>
    ): Promise<Result<T, GamificationError>> {
      return work(makeTx(cloneState(state), () => undefined));
    },

    ledgerFor: (userId) => state.ledger.filter((e) => e.userId === userId),
    progressFor: (userId, lessonId) => state.progress.get(progressKey(userId, lessonId)),
    streakFor: (userId) => state.streaks.get(userId),
    pointsFor: (userId) => state.userPoints.get(userId),
    earnedFor: (userId) => state.earned.filter((ua) => ua.userId === userId),
    commits: () => commitCount,
    attempts: () => attemptCount,
  };
};

// =============================================================================
// Course Catalog & Enrollments
// =============================================================================

export interface FakeCourseCatalogOptions {
  /** courseId -> lesson ids in course order */
  courses?: Record<string, string[]>;
  /** Active enrollments as [userId, courseId] pairs */
  enrollments?: [string, string][];
  simulateDbError?: boolean;
}

/**
 * Catalog and enrollment lookups over plain maps.
 */
export const makeFakeCourseCatalog = (
  options: FakeCourseCatalogOptions = {}
): CourseCatalog & EnrollmentChecker => {
  const courses = new Map(Object.entries(options.courses ?? {}));
  const lessons = new Map<string, LessonRef>();
  for (const [courseId, lessonIds] of courses) {
    for (const lessonId of lessonIds) {
      lessons.set(lessonId, { lessonId, courseId });
    }
  }
  const enrolled = new Set(
    (options.enrollments ?? []).map(([userId, courseId]) => `${userId}:${courseId}`)
  );
  const simulateDbError = options.simulateDbError ?? false;

  const respond = <T>(value: T): Promise<Result<T, GamificationError>> =>
    Promise.resolve(
      simulateDbError ? err(createStoreUnavailableError('Simulated database error')) : ok(value)
    );

  return {
    findLesson: (lessonId) => respond(lessons.get(lessonId) ?? null),
    findCourseLessons: (courseId) => {
      const lessonIds = courses.get(courseId);
      return respond(lessonIds !== undefined ? [...lessonIds] : null);
    },
    isEnrolledInLesson: (userId, lessonId) => {
      const lesson = lessons.get(lessonId);
      return respond(lesson === undefined || enrolled.has(`${userId}:${lesson.courseId}`));
    },
    isEnrolledInCourse: (userId, courseId) => respond(enrolled.has(`${userId}:${courseId}`)),
  };
};
