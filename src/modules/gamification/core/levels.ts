/**
 * Level Calculator
 *
 * Level is a pure function of the current point total.
 */

import { LEVEL_THRESHOLDS, type LevelInfo } from './types.js';

export const MAX_LEVEL = LEVEL_THRESHOLDS.length;

/**
 * Maps a point total to its level and the points still missing for the next one.
 * Totals at or beyond the top threshold stay at MAX_LEVEL with 0 points to go;
 * totals below zero are level 1.
 */
export function levelFor(totalPoints: number): LevelInfo {
  // Level 1 has no lower bound, so the search starts at the level 2 threshold
  for (const [offset, threshold] of LEVEL_THRESHOLDS.slice(1).entries()) {
    if (totalPoints < threshold) {
      return { level: offset + 1, pointsToNextLevel: threshold - totalPoints };
    }
  }

  return { level: MAX_LEVEL, pointsToNextLevel: 0 };
}
