/**
 * Get Leaderboard Use Case
 *
 * Plain ordered read of point totals; no ranking periods or caching.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidInputError, type GamificationError } from '../errors.js';
import { levelFor } from '../levels.js';
import {
  DEFAULT_LEADERBOARD_LIMIT,
  MAX_LEADERBOARD_LIMIT,
  type LeaderboardEntry,
} from '../types.js';

import type { GamificationStore } from '../ports.js';

export interface GetLeaderboardDeps {
  store: GamificationStore;
}

export interface GetLeaderboardInput {
  limit?: number | undefined;
}

/**
 * Top users by total points (ties by user id), ranked from 1.
 */
export async function getLeaderboard(
  deps: GetLeaderboardDeps,
  input: GetLeaderboardInput
): Promise<Result<LeaderboardEntry[], GamificationError>> {
  const limit = input.limit ?? DEFAULT_LEADERBOARD_LIMIT;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LEADERBOARD_LIMIT) {
    return err(
      createInvalidInputError(
        'limit',
        `limit must be an integer between 1 and ${String(MAX_LEADERBOARD_LIMIT)}`
      )
    );
  }

  const topResult = await deps.store.read((tx) => tx.listTopUserPoints(limit));
  if (topResult.isErr()) {
    return err(topResult.error);
  }

  return ok(
    topResult.value.map((points, index) => ({
      rank: index + 1,
      userId: points.userId,
      totalPoints: points.totalPoints,
      level: levelFor(points.totalPoints).level,
    }))
  );
}
