/**
 * Level Calculator Tests
 */

import { describe, it, expect } from 'vitest';

import { levelFor, MAX_LEVEL } from '@/modules/gamification/core/levels.js';

describe('levelFor', () => {
  it('starts every user at level 1', () => {
    expect(levelFor(0)).toEqual({ level: 1, pointsToNextLevel: 100 });
  });

  it('stays below a threshold until it is reached', () => {
    expect(levelFor(99)).toEqual({ level: 1, pointsToNextLevel: 1 });
    expect(levelFor(100)).toEqual({ level: 2, pointsToNextLevel: 200 });
    expect(levelFor(299)).toEqual({ level: 2, pointsToNextLevel: 1 });
    expect(levelFor(300)).toEqual({ level: 3, pointsToNextLevel: 300 });
  });

  it('maps the upper thresholds', () => {
    expect(levelFor(3600)).toEqual({ level: 9, pointsToNextLevel: 1400 });
    expect(levelFor(4999)).toEqual({ level: 9, pointsToNextLevel: 1 });
  });

  it('caps at the top level with nothing left to earn', () => {
    expect(MAX_LEVEL).toBe(10);
    expect(levelFor(5000)).toEqual({ level: 10, pointsToNextLevel: 0 });
    expect(levelFor(250_000)).toEqual({ level: 10, pointsToNextLevel: 0 });
  });

  it('keeps negative totals at level 1', () => {
    expect(levelFor(-5)).toEqual({ level: 1, pointsToNextLevel: 105 });
  });
});
