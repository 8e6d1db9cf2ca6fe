/**
 * Record Activity Use Case
 *
 * Stores a progress report for a lesson and applies every consequence of it
 * (completion, points, streak, achievements) in one unit of work.
 */

import { err, type Result } from 'neverthrow';

import { applyActivityEffects } from '../activity.js';
import { createNotFoundError, type GamificationError } from '../errors.js';
import { normalizeProgressUpdate, upsertLessonProgress } from '../progress.js';
import { withConflictRetry } from '../retry.js';
import {
  COMPLETION_THRESHOLD,
  QUALIFYING_WATCH_SECONDS,
  type ActivitySnapshot,
  type ProgressUpdate,
} from '../types.js';

import type { Clock, CourseCatalog, GamificationStore } from '../ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies shared by the activity use cases.
 */
export interface ActivityDeps {
  store: GamificationStore;
  catalog: CourseCatalog;
  clock: Clock;
  logger: Logger;
  /** IANA zone in which calendar days are counted */
  activityTimeZone: string;
  /** Attempts per operation before a write conflict is surfaced */
  maxConflictRetries: number;
}

export interface RecordActivityInput extends ProgressUpdate {
  userId: string;
  lessonId: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Records watch progress for a lesson.
 *
 * - Unknown lessons fail with NotFoundError before anything is written
 * - Reaching the completion threshold for the first time awards lesson points
 *   (and the course bonus when it was the last open lesson)
 * - A report at or above the completion threshold (rewatches included), or with
 *   at least QUALIFYING_WATCH_SECONDS of watch time, counts as activity for the streak
 */
export async function recordActivity(
  deps: ActivityDeps,
  input: RecordActivityInput
): Promise<Result<ActivitySnapshot, GamificationError>> {
  const { store, catalog, clock, logger, activityTimeZone, maxConflictRetries } = deps;
  const { userId, lessonId } = input;

  const updateResult = normalizeProgressUpdate({
    watchedSeconds: input.watchedSeconds,
    lastPositionSeconds: input.lastPositionSeconds,
    completionPercentage: input.completionPercentage,
  });
  if (updateResult.isErr()) {
    return err(updateResult.error);
  }
  const update = updateResult.value;

  const lessonResult = await catalog.findLesson(lessonId);
  if (lessonResult.isErr()) {
    return err(lessonResult.error);
  }
  const lesson = lessonResult.value;
  if (lesson === null) {
    return err(createNotFoundError('lesson', lessonId));
  }

  return withConflictRetry(
    () =>
      store.transaction(async (tx) => {
        const now = clock.now();

        const upsertResult = await upsertLessonProgress(tx, { userId, lessonId, update, now });
        if (upsertResult.isErr()) {
          return err(upsertResult.error);
        }

        const { next, completionTransition } = upsertResult.value;

        return applyActivityEffects(tx, catalog, {
          userId,
          lesson,
          progress: next,
          completionTransition,
          qualifiesForStreak:
            update.watchedSeconds >= QUALIFYING_WATCH_SECONDS ||
            next.completionPercentage >= COMPLETION_THRESHOLD,
          now,
          timeZone: activityTimeZone,
        });
      }),
    { maxAttempts: maxConflictRetries, operation: 'recordActivity', logger }
  );
}
