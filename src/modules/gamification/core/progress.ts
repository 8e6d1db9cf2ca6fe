/**
 * Progress Store
 *
 * Validation and upsert of per-(user, lesson) progress records. The completion
 * decision is taken on the same record before it is written, so both happen in
 * the caller's unit of work with a single write.
 */

import { ok, err, type Result } from 'neverthrow';

import { isCompletionTransition, markCompleted } from './completion.js';
import { createInvalidInputError, type GamificationError, type InvalidInputError } from './errors.js';

import type { GamificationTx } from './ports.js';
import { MAX_TRACKED_SECONDS, type LessonProgress, type ProgressUpdate } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UpsertProgressInput {
  userId: string;
  lessonId: string;
  update: ProgressUpdate;
  now: Date;
}

export interface UpsertProgressOutput {
  previous: LessonProgress | null;
  next: LessonProgress;
  completionTransition: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pure Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clamps a percentage to [0, 100], dropping any fractional part.
 */
export const clampPercentage = (value: number): number => {
  return Math.min(100, Math.max(0, Math.floor(value)));
};

const validateSeconds = (field: string, value: number): Result<number, InvalidInputError> => {
  if (!Number.isFinite(value) || value < 0) {
    return err(createInvalidInputError(field, `${field} must be a non-negative number`));
  }
  const seconds = Math.floor(value);
  if (seconds > MAX_TRACKED_SECONDS) {
    return err(
      createInvalidInputError(
        field,
        `${field} must not exceed ${String(MAX_TRACKED_SECONDS)} seconds`
      )
    );
  }
  return ok(seconds);
};

/**
 * Normalizes a raw progress report.
 * Seconds must lie within [0, MAX_TRACKED_SECONDS]; the percentage is clamped
 * rather than rejected.
 */
export const normalizeProgressUpdate = (
  update: ProgressUpdate
): Result<ProgressUpdate, InvalidInputError> => {
  const watched = validateSeconds('watchedSeconds', update.watchedSeconds);
  if (watched.isErr()) {
    return err(watched.error);
  }

  const position = validateSeconds('lastPositionSeconds', update.lastPositionSeconds);
  if (position.isErr()) {
    return err(position.error);
  }

  if (!Number.isFinite(update.completionPercentage)) {
    return err(
      createInvalidInputError('completionPercentage', 'completionPercentage must be a number')
    );
  }

  return ok({
    watchedSeconds: watched.value,
    lastPositionSeconds: position.value,
    completionPercentage: clampPercentage(update.completionPercentage),
  });
};

/**
 * Builds the next record from the previous one (if any) and a normalized update.
 * Completion state is carried over unchanged; only the evaluator may flip it.
 */
export const applyProgressUpdate = (
  previous: LessonProgress | null,
  input: UpsertProgressInput
): LessonProgress => ({
  userId: input.userId,
  lessonId: input.lessonId,
  watchedSeconds: input.update.watchedSeconds,
  lastPositionSeconds: input.update.lastPositionSeconds,
  completionPercentage: clampPercentage(input.update.completionPercentage),
  isCompleted: previous?.isCompleted ?? false,
  completedAt: previous?.completedAt ?? null,
  lastUpdatedAt: input.now,
});

// ─────────────────────────────────────────────────────────────────────────────
// Store Operation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Upserts the progress row and applies the completion transition when it fires.
 */
export async function upsertLessonProgress(
  tx: GamificationTx,
  input: UpsertProgressInput
): Promise<Result<UpsertProgressOutput, GamificationError>> {
  const previousResult = await tx.findLessonProgress(input.userId, input.lessonId);
  if (previousResult.isErr()) {
    return err(previousResult.error);
  }

  const previous = previousResult.value;
  const updated = applyProgressUpdate(previous, input);
  const completionTransition = isCompletionTransition(previous, updated);
  const next = completionTransition ? markCompleted(updated, input.now) : updated;

  const saveResult = await tx.saveLessonProgress(next);
  if (saveResult.isErr()) {
    return err(saveResult.error);
  }

  return ok({ previous, next, completionTransition });
}
