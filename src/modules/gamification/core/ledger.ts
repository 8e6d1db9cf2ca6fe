/**
 * Points Ledger
 *
 * Append-only award log with a derived running total. Entries that carry a
 * reference id are unique per (user, reference type, reference id); awarding the
 * same key twice returns the first entry and leaves the total untouched.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidInputError, type GamificationError } from './errors.js';
import { levelFor } from './levels.js';
import { REFERENCE_TYPE_BY_REASON, type AwardPointsInput, type PointsEntry, type UserPoints } from './types.js';

import type { GamificationTx } from './ports.js';

export interface AwardOutcome {
  entry: PointsEntry;
  /** False when the idempotency key was already present */
  applied: boolean;
  userPoints: UserPoints;
}

/**
 * UserPoints for a user with no ledger entries.
 */
export const emptyUserPoints = (userId: string, now: Date): UserPoints => ({
  userId,
  totalPoints: 0,
  ...levelFor(0),
  lastRecomputedAt: now,
});

const loadUserPoints = async (
  tx: GamificationTx,
  userId: string,
  now: Date
): Promise<Result<UserPoints, GamificationError>> => {
  const result = await tx.findUserPoints(userId);
  if (result.isErr()) {
    return err(result.error);
  }
  return ok(result.value ?? emptyUserPoints(userId, now));
};

const unchanged = async (
  tx: GamificationTx,
  entry: PointsEntry,
  now: Date
): Promise<Result<AwardOutcome, GamificationError>> => {
  const pointsResult = await loadUserPoints(tx, entry.userId, now);
  if (pointsResult.isErr()) {
    return err(pointsResult.error);
  }
  return ok({ entry, applied: false, userPoints: pointsResult.value });
};

/**
 * Appends an award and recomputes the user's total and level.
 */
export async function awardPoints(
  tx: GamificationTx,
  input: AwardPointsInput,
  now: Date
): Promise<Result<AwardOutcome, GamificationError>> {
  if (!Number.isSafeInteger(input.points)) {
    return err(createInvalidInputError('points', 'points must be an integer'));
  }

  const referenceType = REFERENCE_TYPE_BY_REASON[input.reason];

  if (input.referenceId !== null) {
    const existingResult = await tx.findPointsEntry(input.userId, referenceType, input.referenceId);
    if (existingResult.isErr()) {
      return err(existingResult.error);
    }
    if (existingResult.value !== null) {
      return unchanged(tx, existingResult.value, now);
    }
  }

  const insertResult = await tx.insertPointsEntry({
    userId: input.userId,
    points: input.points,
    reason: input.reason,
    referenceType,
    referenceId: input.referenceId,
    note: input.note ?? null,
    createdAt: now,
  });
  if (insertResult.isErr()) {
    return err(insertResult.error);
  }

  // Lost a race on the idempotency key
  if (!insertResult.value.inserted) {
    return unchanged(tx, insertResult.value.entry, now);
  }

  const currentResult = await loadUserPoints(tx, input.userId, now);
  if (currentResult.isErr()) {
    return err(currentResult.error);
  }

  const totalPoints = currentResult.value.totalPoints + input.points;
  const userPoints: UserPoints = {
    userId: input.userId,
    totalPoints,
    ...levelFor(totalPoints),
    lastRecomputedAt: now,
  };

  const saveResult = await tx.saveUserPoints(userPoints);
  if (saveResult.isErr()) {
    return err(saveResult.error);
  }

  return ok({ entry: insertResult.value.entry, applied: true, userPoints });
}
