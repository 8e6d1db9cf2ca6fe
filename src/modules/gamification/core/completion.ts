/**
 * Completion Evaluator
 *
 * Pure decisions about the one-time lesson completion transition.
 */

import { COMPLETION_THRESHOLD, type LessonProgress } from './types.js';

/**
 * A completion transition fires iff the lesson was not completed before
 * and the new percentage reaches the threshold.
 */
export const isCompletionTransition = (
  previous: LessonProgress | null,
  next: LessonProgress
): boolean => {
  const wasCompleted = previous?.isCompleted ?? false;
  return !wasCompleted && next.completionPercentage >= COMPLETION_THRESHOLD;
};

/**
 * Whether an explicit "mark complete" request may be honoured.
 * A lesson without a progress row counts as 0%.
 */
export const canMarkComplete = (progress: LessonProgress | null): boolean => {
  return (progress?.completionPercentage ?? 0) >= COMPLETION_THRESHOLD;
};

/**
 * Applies the transition. Completed records are returned untouched so that
 * `completedAt` is written exactly once.
 */
export const markCompleted = (progress: LessonProgress, now: Date): LessonProgress => {
  if (progress.isCompleted) {
    return progress;
  }

  return {
    ...progress,
    isCompleted: true,
    completedAt: now,
  };
};
