/**
 * Gamification Module - Public API
 *
 * Lesson progress, points, levels, streaks and achievements.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LessonProgress,
  ProgressUpdate,
  PointsReason,
  ReferenceType,
  AwardPointsInput,
  PointsEntry,
  NewPointsEntry,
  UserPoints,
  LevelInfo,
  UserStreak,
  StreakTransition,
  GraceStatus,
  AchievementTrigger,
  AchievementTriggerKind,
  Achievement,
  UserAchievement,
  EarnedAchievement,
  AchievementStats,
  LessonRef,
  GamificationSnapshot,
  ActivitySnapshot,
  CourseProgressSummary,
  LeaderboardEntry,
} from './core/types.js';

export {
  COMPLETION_THRESHOLD,
  POINTS_LESSON_COMPLETED,
  POINTS_COURSE_COMPLETED,
  QUALIFYING_WATCH_SECONDS,
  GRACE_WINDOW_DAYS,
  DEFAULT_MAX_CONFLICT_RETRIES,
  LEVEL_THRESHOLDS,
  ACHIEVEMENT_TRIGGER_KINDS,
  REFERENCE_TYPE_BY_REASON,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  GamificationError,
  NotFoundError,
  InsufficientProgressError,
  InvalidInputError,
  ConcurrencyConflictError,
  StoreUnavailableError,
} from './core/errors.js';

export {
  createNotFoundError,
  createInsufficientProgressError,
  createInvalidInputError,
  createConcurrencyConflictError,
  createStoreUnavailableError,
  getHttpStatusForError,
  GAMIFICATION_ERROR_HTTP_STATUS,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type {
  GamificationStore,
  GamificationTx,
  InsertOutcome,
  ProgressTotals,
  CourseCatalog,
  EnrollmentChecker,
  Clock,
} from './core/ports.js';

export { systemClock } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export { levelFor, MAX_LEVEL } from './core/levels.js';
export { isCompletionTransition, canMarkComplete, markCompleted } from './core/completion.js';
export { registerActivity, graceStatus, toActivityDate, daysBetween } from './core/streak.js';
export { awardPoints, type AwardOutcome } from './core/ledger.js';
export {
  evaluateAchievements,
  buildAchievementTrigger,
  triggerThreshold,
  findUnlockable,
} from './core/achievements.js';
export { withConflictRetry, type ConflictRetryOptions } from './core/retry.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  recordActivity,
  type ActivityDeps,
  type RecordActivityInput,
} from './core/usecases/record-activity.js';

export { markComplete, type MarkCompleteInput } from './core/usecases/mark-complete.js';

export {
  getSnapshot,
  type GetSnapshotDeps,
  type GetSnapshotInput,
} from './core/usecases/get-snapshot.js';

export {
  listAchievements,
  listEarnedAchievements,
  type ListAchievementsDeps,
} from './core/usecases/list-achievements.js';

export {
  getCourseProgress,
  courseCompletionSignal,
  type GetCourseProgressDeps,
  type GetCourseProgressInput,
} from './core/usecases/get-course-progress.js';

export {
  adjustPoints,
  type AdjustPointsDeps,
  type AdjustPointsInput,
  type AdjustPointsOutput,
} from './core/usecases/adjust-points.js';

export {
  listPointsHistory,
  type ListPointsHistoryDeps,
  type ListPointsHistoryInput,
} from './core/usecases/list-points-history.js';

export {
  getLeaderboard,
  type GetLeaderboardDeps,
  type GetLeaderboardInput,
} from './core/usecases/get-leaderboard.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repositories
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeGamificationStore,
  toStoreError,
  type GamificationStoreOptions,
} from './shell/repo/kysely-gamification-store.js';

export { makeCourseCatalog, type CourseCatalogOptions } from './shell/repo/kysely-course-catalog.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeGamificationRoutes,
  type MakeGamificationRoutesDeps,
} from './shell/rest/routes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Seeds
// ─────────────────────────────────────────────────────────────────────────────

export {
  loadAchievementSeeds,
  parseAchievementSeeds,
  seedAchievements,
  type AchievementSeed,
  type SeedError,
} from './shell/seeds/seed-achievements.js';
