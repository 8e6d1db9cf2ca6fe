/**
 * Achievement catalog and per-user earned list.
 */

import type { GamificationError } from '../errors.js';
import type { GamificationStore } from '../ports.js';
import type { Achievement, EarnedAchievement } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListAchievementsDeps {
  store: GamificationStore;
}

/**
 * Active achievements in evaluation order.
 */
export async function listAchievements(
  deps: ListAchievementsDeps
): Promise<Result<Achievement[], GamificationError>> {
  return deps.store.read((tx) => tx.listActiveAchievements());
}

/**
 * Achievements the user has earned, newest first.
 */
export async function listEarnedAchievements(
  deps: ListAchievementsDeps,
  input: { userId: string }
): Promise<Result<EarnedAchievement[], GamificationError>> {
  return deps.store.read((tx) => tx.listEarnedAchievements(input.userId));
}
