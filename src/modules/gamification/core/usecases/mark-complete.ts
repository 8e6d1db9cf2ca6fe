/**
 * Mark Complete Use Case
 *
 * Explicit "I finished this lesson" request. Honoured only when the stored
 * progress already reaches the completion threshold.
 */

import { ok, err, type Result } from 'neverthrow';

import { applyActivityEffects } from '../activity.js';
import { canMarkComplete, markCompleted } from '../completion.js';
import {
  createInsufficientProgressError,
  createNotFoundError,
  type GamificationError,
} from '../errors.js';
import { withConflictRetry } from '../retry.js';
import { COMPLETION_THRESHOLD, type ActivitySnapshot } from '../types.js';

import type { ActivityDeps } from './record-activity.js';

export interface MarkCompleteInput {
  userId: string;
  lessonId: string;
}

/**
 * Completes a lesson on request.
 *
 * A lesson without a progress row counts as 0%. Completing an already completed
 * lesson succeeds without changing anything.
 */
export async function markComplete(
  deps: ActivityDeps,
  input: MarkCompleteInput
): Promise<Result<ActivitySnapshot, GamificationError>> {
  const { store, catalog, clock, logger, activityTimeZone, maxConflictRetries } = deps;
  const { userId, lessonId } = input;

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

        const progressResult = await tx.findLessonProgress(userId, lessonId);
        if (progressResult.isErr()) {
          return err(progressResult.error);
        }

        const progress = progressResult.value;
        if (progress === null || !canMarkComplete(progress)) {
          return err(
            createInsufficientProgressError(
              lessonId,
              progress?.completionPercentage ?? 0,
              COMPLETION_THRESHOLD
            )
          );
        }

        const completionTransition = !progress.isCompleted;
        const next = markCompleted(progress, now);

        if (completionTransition) {
          const saveResult = await tx.saveLessonProgress(next);
          if (saveResult.isErr()) {
            return err(saveResult.error);
          }
        }

        const snapshotResult = await applyActivityEffects(tx, catalog, {
          userId,
          lesson,
          progress: next,
          completionTransition,
          qualifiesForStreak: completionTransition,
          now,
          timeZone: activityTimeZone,
        });
        if (snapshotResult.isErr()) {
          return err(snapshotResult.error);
        }

        return ok(snapshotResult.value);
      }),
    { maxAttempts: maxConflictRetries, operation: 'markComplete', logger }
  );
}
