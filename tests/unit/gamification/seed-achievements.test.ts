/**
 * Achievement Seed Tests
 */

import { describe, it, expect } from 'vitest';

import {
  loadAchievementSeeds,
  parseAchievementSeeds,
  type AchievementSeed,
} from '@/modules/gamification/shell/seeds/seed-achievements.js';

const seed = (overrides: Partial<AchievementSeed> = {}): AchievementSeed => ({
  id: '6f1c0a2e-0000-4000-8000-000000000001',
  code: 'streak_3_days',
  title: 'Warming Up',
  description: 'Keep a 3 day streak',
  icon: null,
  category: 'streak',
  triggerKind: 'streak_length',
  triggerThreshold: 3,
  pointsReward: 50,
  sortOrder: 10,
  isActive: true,
  ...overrides,
});

describe('parseAchievementSeeds', () => {
  it('accepts a valid catalog', () => {
    const result = parseAchievementSeeds([seed()]);

    expect(result._unsafeUnwrap()).toEqual([seed()]);
  });

  it('rejects unknown trigger kinds', () => {
    const result = parseAchievementSeeds([{ ...seed(), triggerKind: 'perfect_quiz' }]);

    expect(result._unsafeUnwrapErr().type).toBe('SeedError');
  });

  it('rejects a non-positive threshold', () => {
    const result = parseAchievementSeeds([seed({ triggerThreshold: 0 })]);

    expect(result.isErr()).toBe(true);
  });

  it('rejects duplicate codes', () => {
    const result = parseAchievementSeeds([
      seed(),
      seed({ id: '6f1c0a2e-0000-4000-8000-000000000002' }),
    ]);

    expect(result._unsafeUnwrapErr().message).toBe("Duplicate achievement code 'streak_3_days'");
  });
});

describe('loadAchievementSeeds', () => {
  it('loads the bundled catalog', async () => {
    const result = await loadAchievementSeeds();

    const seeds = result._unsafeUnwrap();
    expect(seeds).toHaveLength(12);
    expect(seeds.map((s) => s.code)).toContain('first_lesson_completed');
    expect(seeds.find((s) => s.code === 'streak_7_days')).toMatchObject({
      triggerKind: 'streak_length',
      triggerThreshold: 7,
    });
  });
});
