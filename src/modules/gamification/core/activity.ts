/**
 * Activity Effects
 *
 * Everything that follows a progress write inside the same unit of work: lesson and
 * course awards, the streak signal, achievement evaluation and the resulting snapshot.
 */

import { ok, err, type Result } from 'neverthrow';

import { evaluateAchievements } from './achievements.js';
import { awardPoints, emptyUserPoints } from './ledger.js';
import { graceStatus, registerActivity, toActivityDate } from './streak.js';
import {
  POINTS_COURSE_COMPLETED,
  POINTS_LESSON_COMPLETED,
  type ActivitySnapshot,
  type LessonProgress,
  type LessonRef,
  type UserStreak,
} from './types.js';

import type { GamificationError } from './errors.js';
import type { CourseCatalog, GamificationTx } from './ports.js';

export interface ActivityEffectsInput {
  userId: string;
  lesson: LessonRef;
  progress: LessonProgress;
  completionTransition: boolean;
  /** Whether the event counts as activity for the streak */
  qualifiesForStreak: boolean;
  now: Date;
  timeZone: string;
}

/**
 * Awards the course bonus when every lesson of the course is now completed.
 * Returns true only for the event that actually applied the award.
 */
async function awardCourseCompletion(
  tx: GamificationTx,
  catalog: CourseCatalog,
  userId: string,
  courseId: string,
  now: Date
): Promise<Result<boolean, GamificationError>> {
  const lessonsResult = await catalog.findCourseLessons(courseId);
  if (lessonsResult.isErr()) {
    return err(lessonsResult.error);
  }

  const lessonIds = lessonsResult.value;
  if (lessonIds === null || lessonIds.length === 0) {
    return ok(false);
  }

  const totalsResult = await tx.getProgressTotals(userId, lessonIds);
  if (totalsResult.isErr()) {
    return err(totalsResult.error);
  }
  if (totalsResult.value.completedLessons < lessonIds.length) {
    return ok(false);
  }

  const awardResult = await awardPoints(
    tx,
    {
      userId,
      points: POINTS_COURSE_COMPLETED,
      reason: 'course_completed',
      referenceId: courseId,
    },
    now
  );
  if (awardResult.isErr()) {
    return err(awardResult.error);
  }

  return ok(awardResult.value.applied);
}

async function signalStreak(
  tx: GamificationTx,
  input: ActivityEffectsInput
): Promise<Result<void, GamificationError>> {
  const previousResult = await tx.findUserStreak(input.userId);
  if (previousResult.isErr()) {
    return err(previousResult.error);
  }

  const { streak, transition } = registerActivity(previousResult.value, {
    userId: input.userId,
    activityDate: toActivityDate(input.now, input.timeZone),
    now: input.now,
    timeZone: input.timeZone,
  });

  if (transition === 'unchanged') {
    return ok(undefined);
  }

  return tx.saveUserStreak(streak);
}

/**
 * Applies the side effects of an already written progress record and returns the
 * consolidated snapshot.
 */
export async function applyActivityEffects(
  tx: GamificationTx,
  catalog: CourseCatalog,
  input: ActivityEffectsInput
): Promise<Result<ActivitySnapshot, GamificationError>> {
  const { userId, lesson, progress, completionTransition, now, timeZone } = input;

  let courseCompleted = false;

  if (completionTransition) {
    const lessonAward = await awardPoints(
      tx,
      {
        userId,
        points: POINTS_LESSON_COMPLETED,
        reason: 'lesson_completed',
        referenceId: lesson.lessonId,
      },
      now
    );
    if (lessonAward.isErr()) {
      return err(lessonAward.error);
    }
  }

  if (input.qualifiesForStreak) {
    const streakResult = await signalStreak(tx, input);
    if (streakResult.isErr()) {
      return err(streakResult.error);
    }
  }

  if (completionTransition) {
    const courseResult = await awardCourseCompletion(tx, catalog, userId, lesson.courseId, now);
    if (courseResult.isErr()) {
      return err(courseResult.error);
    }
    courseCompleted = courseResult.value;
  }

  const unlockedResult = await evaluateAchievements(tx, userId, now);
  if (unlockedResult.isErr()) {
    return err(unlockedResult.error);
  }

  const pointsResult = await tx.findUserPoints(userId);
  if (pointsResult.isErr()) {
    return err(pointsResult.error);
  }

  const streakResult = await tx.findUserStreak(userId);
  if (streakResult.isErr()) {
    return err(streakResult.error);
  }

  const points = pointsResult.value ?? emptyUserPoints(userId, now);
  const streak: UserStreak | null = streakResult.value;
  const grace = graceStatus(streak, toActivityDate(now, timeZone), timeZone);

  return ok({
    progress,
    completionTransition,
    courseCompleted,
    totalPoints: points.totalPoints,
    level: points.level,
    pointsToNextLevel: points.pointsToNextLevel,
    currentStreak: streak?.currentStreak ?? 0,
    longestStreak: streak?.longestStreak ?? 0,
    graceAvailable: grace.graceAvailable,
    newlyUnlockedAchievements: unlockedResult.value,
  });
}
