/**
 * Gamification Module - Domain Types
 *
 * Lesson progress, points ledger, streaks, levels and achievements.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Completion percentage at which a lesson counts as completed */
export const COMPLETION_THRESHOLD = 95;

/** Points awarded once per completed lesson */
export const POINTS_LESSON_COMPLETED = 10;

/** Points awarded once per completed course */
export const POINTS_COURSE_COMPLETED = 100;

/** Watch time that counts as daily activity even without a completion */
export const QUALIFYING_WATCH_SECONDS = 60;

/** Largest watch time or position a progress row stores (INTEGER column range). */
export const MAX_TRACKED_SECONDS = 2_147_483_647;

/** Length of the rolling window in which a single grace day may be used */
export const GRACE_WINDOW_DAYS = 30;

/** Default number of attempts for an operation that hits a write conflict */
export const DEFAULT_MAX_CONFLICT_RETRIES = 3;

/** Number of achievements shown in the snapshot's "recent" list */
export const RECENT_ACHIEVEMENTS_LIMIT = 3;

export const DEFAULT_LEADERBOARD_LIMIT = 10;
export const MAX_LEADERBOARD_LIMIT = 100;
export const DEFAULT_POINTS_HISTORY_LIMIT = 50;
export const MAX_POINTS_HISTORY_LIMIT = 200;

/**
 * Minimum total points for levels 1..10.
 * Index i holds the threshold of level i + 1.
 */
export const LEVEL_THRESHOLDS: readonly number[] = [
  0, 100, 300, 600, 1000, 1500, 2100, 2800, 3600, 5000,
];

// ─────────────────────────────────────────────────────────────────────────────
// Lesson Progress
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Progress of one user on one lesson.
 * `isCompleted` flips false -> true at most once; `completedAt` is set together with it.
 */
export interface LessonProgress {
  userId: string;
  lessonId: string;
  watchedSeconds: number;
  lastPositionSeconds: number;
  /** Always within [0, 100] */
  completionPercentage: number;
  isCompleted: boolean;
  completedAt: Date | null;
  lastUpdatedAt: Date;
}

/**
 * Raw progress report for a lesson, as received from the player.
 */
export interface ProgressUpdate {
  watchedSeconds: number;
  lastPositionSeconds: number;
  completionPercentage: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Points Ledger
// ─────────────────────────────────────────────────────────────────────────────

export type PointsReason =
  | 'lesson_completed'
  | 'course_completed'
  | 'achievement_unlocked'
  | 'manual_adjustment';

export type ReferenceType = 'lesson' | 'course' | 'achievement' | 'adjustment';

/**
 * Reference type recorded for each award reason.
 */
export const REFERENCE_TYPE_BY_REASON: Record<PointsReason, ReferenceType> = {
  lesson_completed: 'lesson',
  course_completed: 'course',
  achievement_unlocked: 'achievement',
  manual_adjustment: 'adjustment',
};

/**
 * Input for a ledger award.
 * Exactly-once reasons must always carry a reference id; the others may omit it,
 * in which case duplicates are allowed.
 */
export type AwardPointsInput =
  | {
      userId: string;
      points: number;
      reason: 'lesson_completed' | 'achievement_unlocked';
      referenceId: string;
      note?: string | null;
    }
  | {
      userId: string;
      points: number;
      reason: 'course_completed' | 'manual_adjustment';
      referenceId: string | null;
      note?: string | null;
    };

/**
 * Ledger entry as stored.
 */
export interface PointsEntry {
  id: string;
  userId: string;
  points: number;
  reason: PointsReason;
  referenceType: ReferenceType;
  referenceId: string | null;
  note: string | null;
  createdAt: Date;
}

/**
 * Ledger entry before the store has assigned an id.
 */
export type NewPointsEntry = Omit<PointsEntry, 'id'>;

/**
 * Derived per-user aggregate of the ledger.
 */
export interface UserPoints {
  userId: string;
  totalPoints: number;
  level: number;
  pointsToNextLevel: number;
  lastRecomputedAt: Date;
}

export interface LevelInfo {
  level: number;
  pointsToNextLevel: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Streaks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Daily activity streak state.
 */
export interface UserStreak {
  userId: string;
  currentStreak: number;
  /** Running maximum of currentStreak */
  longestStreak: number;
  /** Calendar date (YYYY-MM-DD) in the activity time zone */
  lastActivityDate: string;
  gracePeriodUsedAt: Date | null;
}

/**
 * What a single activity did to the streak.
 */
export type StreakTransition = 'started' | 'unchanged' | 'extended' | 'grace_extended' | 'reset';

export interface GraceStatus {
  graceAvailable: boolean;
  /** 0 when grace is available */
  daysUntilGraceAvailable: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Achievements
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Unlock condition of an achievement, one variant per measured aggregate.
 */
export type AchievementTrigger =
  | { kind: 'streak_length'; days: number }
  | { kind: 'lesson_count'; lessons: number }
  | { kind: 'watch_time_total'; seconds: number }
  | { kind: 'course_count'; courses: number }
  | { kind: 'points_total'; points: number };

export type AchievementTriggerKind = AchievementTrigger['kind'];

export const ACHIEVEMENT_TRIGGER_KINDS: readonly AchievementTriggerKind[] = [
  'streak_length',
  'lesson_count',
  'watch_time_total',
  'course_count',
  'points_total',
];

/**
 * Catalog entry (read-only to this module).
 */
export interface Achievement {
  id: string;
  code: string;
  title: string;
  description: string;
  icon: string | null;
  category: string;
  trigger: AchievementTrigger;
  pointsReward: number;
  sortOrder: number;
  isActive: boolean;
}

export interface UserAchievement {
  userId: string;
  achievementId: string;
  earnedAt: Date;
  /** Aggregate value measured when the achievement was unlocked */
  progressValue: number | null;
}

/**
 * Earned achievement joined with its catalog entry.
 */
export interface EarnedAchievement extends UserAchievement {
  achievement: Achievement;
}

/**
 * Aggregates that achievement triggers are evaluated against.
 */
export interface AchievementStats {
  currentStreak: number;
  completedLessons: number;
  watchTimeSeconds: number;
  completedCourses: number;
  totalPoints: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface LessonRef {
  lessonId: string;
  courseId: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Snapshots
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read model of a user's gamification state.
 */
export interface GamificationSnapshot {
  userId: string;
  totalPoints: number;
  level: number;
  pointsToNextLevel: number;
  currentStreak: number;
  longestStreak: number;
  lastActivityDate: string | null;
  graceAvailable: boolean;
  daysUntilGraceAvailable: number;
  recentAchievements: EarnedAchievement[];
  totalAchievementsEarned: number;
  totalAchievementsAvailable: number;
}

/**
 * Result of an activity event (progress update or explicit completion).
 */
export interface ActivitySnapshot {
  progress: LessonProgress;
  /** True when this event completed the lesson */
  completionTransition: boolean;
  /** True when this event completed the lesson's whole course */
  courseCompleted: boolean;
  totalPoints: number;
  level: number;
  pointsToNextLevel: number;
  currentStreak: number;
  longestStreak: number;
  graceAvailable: boolean;
  newlyUnlockedAchievements: Achievement[];
}

export interface CourseProgressSummary {
  courseId: string;
  totalLessons: number;
  completedLessons: number;
  /** floor(completed / total * 100), 0 for an empty course */
  progressPercentage: number;
  totalWatchTimeSeconds: number;
  isCompleted: boolean;
}

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  totalPoints: number;
  level: number;
}
