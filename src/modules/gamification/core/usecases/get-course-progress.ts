/**
 * Course Progress Use Cases
 *
 * Per-course summary for a user and the "course fully completed" signal
 * consumed by certificate issuing.
 */

import { ok, err, type Result } from 'neverthrow';

import { createNotFoundError, type GamificationError } from '../errors.js';

import type { CourseCatalog, GamificationStore } from '../ports.js';
import type { CourseProgressSummary } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GetCourseProgressDeps {
  store: GamificationStore;
  catalog: CourseCatalog;
}

export interface GetCourseProgressInput {
  userId: string;
  courseId: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Summarizes a user's progress across every lesson of a course.
 * An empty course is reported at 0% and never completed.
 */
export async function getCourseProgress(
  deps: GetCourseProgressDeps,
  input: GetCourseProgressInput
): Promise<Result<CourseProgressSummary, GamificationError>> {
  const { store, catalog } = deps;
  const { userId, courseId } = input;

  const lessonsResult = await catalog.findCourseLessons(courseId);
  if (lessonsResult.isErr()) {
    return err(lessonsResult.error);
  }

  const lessonIds = lessonsResult.value;
  if (lessonIds === null) {
    return err(createNotFoundError('course', courseId));
  }

  const totalsResult = await store.read((tx) => tx.getProgressTotals(userId, lessonIds));
  if (totalsResult.isErr()) {
    return err(totalsResult.error);
  }

  const totalLessons = lessonIds.length;
  const { completedLessons, watchedSeconds } = totalsResult.value;

  return ok({
    courseId,
    totalLessons,
    completedLessons,
    progressPercentage:
      totalLessons === 0 ? 0 : Math.floor((completedLessons / totalLessons) * 100),
    totalWatchTimeSeconds: watchedSeconds,
    isCompleted: totalLessons > 0 && completedLessons >= totalLessons,
  });
}

/**
 * True once every lesson of the course is completed by the user.
 */
export async function courseCompletionSignal(
  deps: GetCourseProgressDeps,
  input: GetCourseProgressInput
): Promise<Result<boolean, GamificationError>> {
  const summaryResult = await getCourseProgress(deps, input);
  if (summaryResult.isErr()) {
    return err(summaryResult.error);
  }
  return ok(summaryResult.value.isCompleted);
}
