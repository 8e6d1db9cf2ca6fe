/**
 * Gamification Module - Ports (Interfaces)
 *
 * Store, catalog and clock contracts the use cases depend on.
 * These define WHAT we need, not HOW it's implemented.
 */

import type { GamificationError } from './errors.js';
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
} from './types.js';
import type { Result } from 'neverthrow';

type StoreResult<T> = Promise<Result<T, GamificationError>>;

// ─────────────────────────────────────────────────────────────────────────────
// Store Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outcome of an insert guarded by a uniqueness constraint.
 * When `inserted` is false, `entry` is the row that already held the key.
 */
export interface InsertOutcome<T> {
  entry: T;
  inserted: boolean;
}

/**
 * Progress aggregates over a set of lessons (or all of a user's lessons).
 */
export interface ProgressTotals {
  completedLessons: number;
  watchedSeconds: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Unit of Work
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Store operations available inside one unit of work.
 *
 * Reads of progress and streak rows lock them for the rest of the transaction.
 */
export interface GamificationTx {
  // Lesson progress
  findLessonProgress(userId: string, lessonId: string): StoreResult<LessonProgress | null>;
  saveLessonProgress(progress: LessonProgress): StoreResult<void>;
  /** Totals over the given lessons, or over all of the user's lessons when omitted */
  getProgressTotals(userId: string, lessonIds?: readonly string[]): StoreResult<ProgressTotals>;

  // Points ledger
  findPointsEntry(
    userId: string,
    referenceType: ReferenceType,
    referenceId: string
  ): StoreResult<PointsEntry | null>;
  /** Appends an entry; a duplicate idempotency key yields the existing row */
  insertPointsEntry(entry: NewPointsEntry): StoreResult<InsertOutcome<PointsEntry>>;
  countPointsEntries(userId: string, reason: PointsReason): StoreResult<number>;
  listPointsEntries(userId: string, limit: number): StoreResult<PointsEntry[]>;
  findUserPoints(userId: string): StoreResult<UserPoints | null>;
  saveUserPoints(points: UserPoints): StoreResult<void>;
  /** Highest totals first, ties broken by user id */
  listTopUserPoints(limit: number): StoreResult<UserPoints[]>;

  // Streaks
  findUserStreak(userId: string): StoreResult<UserStreak | null>;
  saveUserStreak(streak: UserStreak): StoreResult<void>;

  // Achievements
  /** Active catalog in evaluation order (sortOrder, then code) */
  listActiveAchievements(): StoreResult<Achievement[]>;
  /** Newest first */
  listEarnedAchievements(userId: string): StoreResult<EarnedAchievement[]>;
  insertUserAchievement(achievement: UserAchievement): StoreResult<InsertOutcome<UserAchievement>>;
}

/**
 * Durable store with an explicit transactional boundary.
 */
export interface GamificationStore {
  /**
   * Runs `work` as one atomic unit. Commits when it returns ok; rolls back every write
   * when it returns err or throws. Conflicting concurrent writers surface as
   * ConcurrencyConflictError.
   */
  transaction<T>(
    work: (tx: GamificationTx) => Promise<Result<T, GamificationError>>
  ): Promise<Result<T, GamificationError>>;

  /**
   * Runs read-only `work` without opening a transaction.
   */
  read<T>(
    work: (tx: GamificationTx) => Promise<Result<T, GamificationError>>
  ): Promise<Result<T, GamificationError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Collaborators
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view of the course catalog.
 */
export interface CourseCatalog {
  findLesson(lessonId: string): StoreResult<LessonRef | null>;
  /** Lesson ids of a course, or null if the course does not exist */
  findCourseLessons(courseId: string): StoreResult<string[] | null>;
}

/**
 * Enrollment lookup, consulted by the transport layer before it calls the core.
 */
export interface EnrollmentChecker {
  isEnrolledInLesson(userId: string, lessonId: string): StoreResult<boolean>;
  isEnrolledInCourse(userId: string, courseId: string): StoreResult<boolean>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
