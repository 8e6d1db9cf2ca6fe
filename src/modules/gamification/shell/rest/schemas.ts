/**
 * Gamification REST API Schemas
 *
 * TypeBox schemas for request/response validation.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

import {
  MAX_LEADERBOARD_LIMIT,
  MAX_POINTS_HISTORY_LIMIT,
  MAX_TRACKED_SECONDS,
} from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Params & Query
// ─────────────────────────────────────────────────────────────────────────────

const IdSchema = Type.String({ minLength: 1, maxLength: 200 });

export const LessonParamsSchema = Type.Object({ lessonId: IdSchema }, { additionalProperties: false });
export type LessonParams = Static<typeof LessonParamsSchema>;

export const CourseParamsSchema = Type.Object({ courseId: IdSchema }, { additionalProperties: false });
export type CourseParams = Static<typeof CourseParamsSchema>;

export const PointsHistoryQuerySchema = Type.Object(
  {
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_POINTS_HISTORY_LIMIT })),
  },
  { additionalProperties: false }
);
export type PointsHistoryQuery = Static<typeof PointsHistoryQuerySchema>;

export const LeaderboardQuerySchema = Type.Object(
  {
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_LEADERBOARD_LIMIT })),
  },
  { additionalProperties: false }
);
export type LeaderboardQuery = Static<typeof LeaderboardQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Request Bodies
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Progress report sent by the player. The percentage is clamped server-side.
 */
export const RecordProgressBodySchema = Type.Object(
  {
    watchedSeconds: Type.Number({ minimum: 0, maximum: MAX_TRACKED_SECONDS }),
    lastPositionSeconds: Type.Number({ minimum: 0, maximum: MAX_TRACKED_SECONDS }),
    completionPercentage: Type.Number(),
  },
  { additionalProperties: false }
);
export type RecordProgressBody = Static<typeof RecordProgressBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Parts
// ─────────────────────────────────────────────────────────────────────────────

const TimestampSchema = Type.String({ format: 'date-time' });

export const AchievementSchema = Type.Object({
  id: Type.String(),
  code: Type.String(),
  title: Type.String(),
  description: Type.String(),
  icon: Type.Union([Type.String(), Type.Null()]),
  category: Type.String(),
  triggerKind: Type.String(),
  threshold: Type.Number(),
  pointsReward: Type.Number(),
});

export const EarnedAchievementSchema = Type.Object({
  achievement: AchievementSchema,
  earnedAt: TimestampSchema,
  progressValue: Type.Union([Type.Number(), Type.Null()]),
});

export const LessonProgressSchema = Type.Object({
  lessonId: Type.String(),
  watchedSeconds: Type.Number(),
  lastPositionSeconds: Type.Number(),
  completionPercentage: Type.Number(),
  isCompleted: Type.Boolean(),
  completedAt: Type.Union([TimestampSchema, Type.Null()]),
  lastUpdatedAt: TimestampSchema,
});

export const ActivitySnapshotSchema = Type.Object({
  progress: LessonProgressSchema,
  completionTransition: Type.Boolean(),
  courseCompleted: Type.Boolean(),
  totalPoints: Type.Number(),
  level: Type.Number(),
  pointsToNextLevel: Type.Number(),
  currentStreak: Type.Number(),
  longestStreak: Type.Number(),
  graceAvailable: Type.Boolean(),
  newlyUnlockedAchievements: Type.Array(AchievementSchema),
});

export const GamificationSnapshotSchema = Type.Object({
  userId: Type.String(),
  totalPoints: Type.Number(),
  level: Type.Number(),
  pointsToNextLevel: Type.Number(),
  currentStreak: Type.Number(),
  longestStreak: Type.Number(),
  lastActivityDate: Type.Union([Type.String(), Type.Null()]),
  graceAvailable: Type.Boolean(),
  daysUntilGraceAvailable: Type.Number(),
  recentAchievements: Type.Array(EarnedAchievementSchema),
  totalAchievementsEarned: Type.Number(),
  totalAchievementsAvailable: Type.Number(),
});

export const CourseProgressSchema = Type.Object({
  courseId: Type.String(),
  totalLessons: Type.Number(),
  completedLessons: Type.Number(),
  progressPercentage: Type.Number(),
  totalWatchTimeSeconds: Type.Number(),
  isCompleted: Type.Boolean(),
});

export const PointsEntrySchema = Type.Object({
  id: Type.String(),
  points: Type.Number(),
  reason: Type.String(),
  referenceType: Type.String(),
  referenceId: Type.Union([Type.String(), Type.Null()]),
  note: Type.Union([Type.String(), Type.Null()]),
  createdAt: TimestampSchema,
});

export const LeaderboardEntrySchema = Type.Object({
  rank: Type.Number(),
  userId: Type.String(),
  totalPoints: Type.Number(),
  level: Type.Number(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Response Envelopes
// ─────────────────────────────────────────────────────────────────────────────

const okResponse = <T extends TSchema>(data: T) =>
  Type.Object({
    ok: Type.Literal(true),
    data,
  });

export const ActivityResponseSchema = okResponse(ActivitySnapshotSchema);
export const SnapshotResponseSchema = okResponse(GamificationSnapshotSchema);
export const CourseProgressResponseSchema = okResponse(CourseProgressSchema);
export const CourseCompletionResponseSchema = okResponse(
  Type.Object({ courseId: Type.String(), isCompleted: Type.Boolean() })
);
export const AchievementsResponseSchema = okResponse(Type.Array(AchievementSchema));
export const EarnedAchievementsResponseSchema = okResponse(Type.Array(EarnedAchievementSchema));
export const PointsHistoryResponseSchema = okResponse(Type.Array(PointsEntrySchema));
export const LeaderboardResponseSchema = okResponse(Type.Array(LeaderboardEntrySchema));

/**
 * Error response.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
