/**
 * Gamification REST Routes
 *
 * Lesson progress, course progress and gamification read endpoints.
 * All endpoints require authentication; activity and course progress endpoints
 * additionally require an active enrollment in the lesson's course.
 */

import {
  AchievementsResponseSchema,
  ActivityResponseSchema,
  CourseCompletionResponseSchema,
  CourseParamsSchema,
  CourseProgressResponseSchema,
  EarnedAchievementsResponseSchema,
  ErrorResponseSchema,
  LeaderboardQuerySchema,
  LeaderboardResponseSchema,
  LessonParamsSchema,
  PointsHistoryQuerySchema,
  PointsHistoryResponseSchema,
  RecordProgressBodySchema,
  SnapshotResponseSchema,
  type CourseParams,
  type LeaderboardQuery,
  type LessonParams,
  type PointsHistoryQuery,
  type RecordProgressBody,
} from './schemas.js';
import { isAuthenticated } from '../../../auth/core/types.js';
import { requireAuthHandler } from '../../../auth/shell/middleware/fastify-auth.js';
import { triggerThreshold } from '../../core/achievements.js';
import { getHttpStatusForError, type GamificationError } from '../../core/errors.js';
import { listAchievements, listEarnedAchievements } from '../../core/usecases/list-achievements.js';
import { courseCompletionSignal, getCourseProgress } from '../../core/usecases/get-course-progress.js';
import { getLeaderboard } from '../../core/usecases/get-leaderboard.js';
import { getSnapshot } from '../../core/usecases/get-snapshot.js';
import { listPointsHistory } from '../../core/usecases/list-points-history.js';
import { markComplete } from '../../core/usecases/mark-complete.js';
import { recordActivity } from '../../core/usecases/record-activity.js';

import type {
  Clock,
  CourseCatalog,
  EnrollmentChecker,
  GamificationStore,
} from '../../core/ports.js';
import type {
  Achievement,
  ActivitySnapshot,
  EarnedAchievement,
  GamificationSnapshot,
  PointsEntry,
} from '../../core/types.js';
import type { FastifyBaseLogger, FastifyPluginAsync, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for gamification routes.
 */
export interface MakeGamificationRoutesDeps {
  store: GamificationStore;
  catalog: CourseCatalog;
  enrollments: EnrollmentChecker;
  clock: Clock;
  logger: Logger;
  activityTimeZone: string;
  maxConflictRetries: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendUnauthorized(reply: FastifyReply) {
  return reply.status(401).send({
    ok: false,
    error: 'Unauthorized',
    message: 'Authentication required',
  });
}

function sendNotEnrolled(reply: FastifyReply) {
  return reply.status(403).send({
    ok: false,
    error: 'NotEnrolledError',
    message: 'An active enrollment in this course is required',
  });
}

function sendError(log: FastifyBaseLogger, reply: FastifyReply, error: GamificationError) {
  const status = getHttpStatusForError(error);

  if (error.type === 'StoreUnavailableError') {
    log.error({ err: error.cause, errorType: error.type }, error.message);
  } else if (error.type === 'ConcurrencyConflictError') {
    log.warn({ errorType: error.type }, error.message);
  }

  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const toAchievementDto = (achievement: Achievement) => ({
  id: achievement.id,
  code: achievement.code,
  title: achievement.title,
  description: achievement.description,
  icon: achievement.icon,
  category: achievement.category,
  triggerKind: achievement.trigger.kind,
  threshold: triggerThreshold(achievement.trigger),
  pointsReward: achievement.pointsReward,
});

const toEarnedAchievementDto = (earned: EarnedAchievement) => ({
  achievement: toAchievementDto(earned.achievement),
  earnedAt: earned.earnedAt.toISOString(),
  progressValue: earned.progressValue,
});

const toActivityDto = (snapshot: ActivitySnapshot) => ({
  ...snapshot,
  progress: {
    lessonId: snapshot.progress.lessonId,
    watchedSeconds: snapshot.progress.watchedSeconds,
    lastPositionSeconds: snapshot.progress.lastPositionSeconds,
    completionPercentage: snapshot.progress.completionPercentage,
    isCompleted: snapshot.progress.isCompleted,
    completedAt: snapshot.progress.completedAt?.toISOString() ?? null,
    lastUpdatedAt: snapshot.progress.lastUpdatedAt.toISOString(),
  },
  newlyUnlockedAchievements: snapshot.newlyUnlockedAchievements.map(toAchievementDto),
});

const toSnapshotDto = (snapshot: GamificationSnapshot) => ({
  ...snapshot,
  recentAchievements: snapshot.recentAchievements.map(toEarnedAchievementDto),
});

const toPointsEntryDto = (entry: PointsEntry) => ({
  id: entry.id,
  points: entry.points,
  reason: entry.reason,
  referenceType: entry.referenceType,
  referenceId: entry.referenceId,
  note: entry.note,
  createdAt: entry.createdAt.toISOString(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates gamification REST routes.
 */
export const makeGamificationRoutes = (deps: MakeGamificationRoutesDeps): FastifyPluginAsync => {
  const { store, catalog, enrollments, clock, logger, activityTimeZone, maxConflictRetries } = deps;
  const activityDeps = { store, catalog, clock, logger, activityTimeZone, maxConflictRetries };

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // PUT /api/v1/lessons/:lessonId/progress - Record watch progress
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: LessonParams; Body: RecordProgressBody }>(
      '/api/v1/lessons/:lessonId/progress',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: LessonParamsSchema,
          body: RecordProgressBodySchema,
          response: {
            200: ActivityResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            409: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const userId = request.auth.userId;
        const { lessonId } = request.params;

        const enrolled = await enrollments.isEnrolledInLesson(userId, lessonId);
        if (enrolled.isErr()) {
          return sendError(request.log, reply, enrolled.error);
        }
        if (!enrolled.value) {
          return sendNotEnrolled(reply);
        }

        const result = await recordActivity(activityDeps, {
          userId,
          lessonId,
          ...request.body,
        });

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: toActivityDto(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/lessons/:lessonId/complete - Explicitly complete a lesson
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Params: LessonParams }>(
      '/api/v1/lessons/:lessonId/complete',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: LessonParamsSchema,
          response: {
            200: ActivityResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            409: ErrorResponseSchema,
            422: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const userId = request.auth.userId;
        const { lessonId } = request.params;

        const enrolled = await enrollments.isEnrolledInLesson(userId, lessonId);
        if (enrolled.isErr()) {
          return sendError(request.log, reply, enrolled.error);
        }
        if (!enrolled.value) {
          return sendNotEnrolled(reply);
        }

        const result = await markComplete(activityDeps, { userId, lessonId });

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: toActivityDto(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/courses/:courseId/progress - Course summary
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: CourseParams }>(
      '/api/v1/courses/:courseId/progress',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: CourseParamsSchema,
          response: {
            200: CourseProgressResponseSchema,
            401: ErrorResponseSchema,
            403: ErrorResponseSchema,
            404: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const userId = request.auth.userId;
        const { courseId } = request.params;

        const enrolled = await enrollments.isEnrolledInCourse(userId, courseId);
        if (enrolled.isErr()) {
          return sendError(request.log, reply, enrolled.error);
        }
        if (!enrolled.value) {
          return sendNotEnrolled(reply);
        }

        const result = await getCourseProgress({ store, catalog }, { userId, courseId });

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/courses/:courseId/completion - Course fully completed signal
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: CourseParams }>(
      '/api/v1/courses/:courseId/completion',
      {
        preHandler: requireAuthHandler,
        schema: {
          params: CourseParamsSchema,
          response: {
            200: CourseCompletionResponseSchema,
            401: ErrorResponseSchema,
            404: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const { courseId } = request.params;
        const result = await courseCompletionSignal(
          { store, catalog },
          { userId: request.auth.userId, courseId }
        );

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: { courseId, isCompleted: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/gamification/me - Gamification snapshot
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/gamification/me',
      {
        preHandler: requireAuthHandler,
        schema: {
          response: {
            200: SnapshotResponseSchema,
            401: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await getSnapshot(
          { store, clock, activityTimeZone },
          { userId: request.auth.userId }
        );

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: toSnapshotDto(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/gamification/achievements - Active catalog
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/gamification/achievements',
      {
        preHandler: requireAuthHandler,
        schema: {
          response: {
            200: AchievementsResponseSchema,
            401: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await listAchievements({ store });

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value.map(toAchievementDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/gamification/achievements/me - Earned achievements
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/gamification/achievements/me',
      {
        preHandler: requireAuthHandler,
        schema: {
          response: {
            200: EarnedAchievementsResponseSchema,
            401: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await listEarnedAchievements({ store }, { userId: request.auth.userId });

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply
          .status(200)
          .send({ ok: true, data: result.value.map(toEarnedAchievementDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/gamification/points/history - Ledger entries
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: PointsHistoryQuery }>(
      '/api/v1/gamification/points/history',
      {
        preHandler: requireAuthHandler,
        schema: {
          querystring: PointsHistoryQuerySchema,
          response: {
            200: PointsHistoryResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await listPointsHistory(
          { store },
          { userId: request.auth.userId, limit: request.query.limit }
        );

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value.map(toPointsEntryDto) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/gamification/leaderboard - Top users by points
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: LeaderboardQuery }>(
      '/api/v1/gamification/leaderboard',
      {
        preHandler: requireAuthHandler,
        schema: {
          querystring: LeaderboardQuerySchema,
          response: {
            200: LeaderboardResponseSchema,
            400: ErrorResponseSchema,
            401: ErrorResponseSchema,
            503: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        if (!isAuthenticated(request.auth)) {
          return sendUnauthorized(reply);
        }

        const result = await getLeaderboard({ store }, { limit: request.query.limit });

        if (result.isErr()) {
          return sendError(request.log, reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value });
      }
    );
  };
};
