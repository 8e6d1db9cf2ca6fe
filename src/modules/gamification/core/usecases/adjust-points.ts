/**
 * Adjust Points Use Case
 *
 * Manual ledger correction for support tooling. Adjustments may be negative,
 * so they can lower the user's level.
 */

import { ok, err, type Result } from 'neverthrow';

import { evaluateAchievements } from '../achievements.js';
import { createInvalidInputError, type GamificationError } from '../errors.js';
import { awardPoints } from '../ledger.js';
import { withConflictRetry } from '../retry.js';

import type { Clock, GamificationStore } from '../ports.js';
import type { Achievement, PointsEntry, UserPoints } from '../types.js';
import type { Logger } from 'pino';

export interface AdjustPointsDeps {
  store: GamificationStore;
  clock: Clock;
  logger: Logger;
  maxConflictRetries: number;
}

export interface AdjustPointsInput {
  userId: string;
  /** Signed, non-zero */
  points: number;
  note?: string | undefined;
  /** When given, repeating the adjustment with the same id is a no-op */
  referenceId?: string | undefined;
}

export interface AdjustPointsOutput {
  entry: PointsEntry;
  applied: boolean;
  userPoints: UserPoints;
  newlyUnlockedAchievements: Achievement[];
}

export async function adjustPoints(
  deps: AdjustPointsDeps,
  input: AdjustPointsInput
): Promise<Result<AdjustPointsOutput, GamificationError>> {
  const { store, clock, logger, maxConflictRetries } = deps;
  const { userId, points } = input;

  if (!Number.isSafeInteger(points) || points === 0) {
    return err(createInvalidInputError('points', 'points must be a non-zero integer'));
  }

  const result = await withConflictRetry(
    () =>
      store.transaction(async (tx) => {
        const now = clock.now();

        const awardResult = await awardPoints(
          tx,
          {
            userId,
            points,
            reason: 'manual_adjustment',
            referenceId: input.referenceId ?? null,
            note: input.note ?? null,
          },
          now
        );
        if (awardResult.isErr()) {
          return err(awardResult.error);
        }

        const unlockedResult = await evaluateAchievements(tx, userId, now);
        if (unlockedResult.isErr()) {
          return err(unlockedResult.error);
        }

        const pointsResult = await tx.findUserPoints(userId);
        if (pointsResult.isErr()) {
          return err(pointsResult.error);
        }

        return ok({
          entry: awardResult.value.entry,
          applied: awardResult.value.applied,
          userPoints: pointsResult.value ?? awardResult.value.userPoints,
          newlyUnlockedAchievements: unlockedResult.value,
        });
      }),
    { maxAttempts: maxConflictRetries, operation: 'adjustPoints', logger }
  );

  if (result.isOk() && result.value.applied) {
    logger.info(
      { userId, points, entryId: result.value.entry.id, totalPoints: result.value.userPoints.totalPoints },
      'Applied manual points adjustment'
    );
  }

  return result;
}
