/**
 * List Points History Use Case
 */

import { err, type Result } from 'neverthrow';

import { createInvalidInputError, type GamificationError } from '../errors.js';
import { DEFAULT_POINTS_HISTORY_LIMIT, MAX_POINTS_HISTORY_LIMIT, type PointsEntry } from '../types.js';

import type { GamificationStore } from '../ports.js';

export interface ListPointsHistoryDeps {
  store: GamificationStore;
}

export interface ListPointsHistoryInput {
  userId: string;
  limit?: number | undefined;
}

/**
 * Ledger entries of a user, newest first.
 */
export async function listPointsHistory(
  deps: ListPointsHistoryDeps,
  input: ListPointsHistoryInput
): Promise<Result<PointsEntry[], GamificationError>> {
  const limit = input.limit ?? DEFAULT_POINTS_HISTORY_LIMIT;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_POINTS_HISTORY_LIMIT) {
    return err(
      createInvalidInputError(
        'limit',
        `limit must be an integer between 1 and ${String(MAX_POINTS_HISTORY_LIMIT)}`
      )
    );
  }

  return deps.store.read((tx) => tx.listPointsEntries(input.userId, limit));
}
