/**
 * Streak Tracker
 *
 * Per-user daily activity state machine with one grace day per rolling window.
 * All dates are calendar dates (YYYY-MM-DD) in the configured activity time zone.
 */

import { GRACE_WINDOW_DAYS, type GraceStatus, type StreakTransition, type UserStreak } from './types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ─────────────────────────────────────────────────────────────────────────────
// Date Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Calendar date of an instant in the given IANA time zone.
 */
export function toActivityDate(instant: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  const fromMs = Date.parse(`${from}T00:00:00Z`);
  const toMs = Date.parse(`${to}T00:00:00Z`);
  return Math.round((toMs - fromMs) / MS_PER_DAY);
}

// ─────────────────────────────────────────────────────────────────────────────
// Grace
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Grace is available when it was never used, or was last used at least
 * GRACE_WINDOW_DAYS calendar days before `onDate`.
 */
export function graceStatus(
  streak: UserStreak | null,
  onDate: string,
  timeZone: string
): GraceStatus {
  if (streak?.gracePeriodUsedAt == null) {
    return { graceAvailable: true, daysUntilGraceAvailable: 0 };
  }

  const elapsed = daysBetween(toActivityDate(streak.gracePeriodUsedAt, timeZone), onDate);
  if (elapsed >= GRACE_WINDOW_DAYS) {
    return { graceAvailable: true, daysUntilGraceAvailable: 0 };
  }

  return { graceAvailable: false, daysUntilGraceAvailable: GRACE_WINDOW_DAYS - elapsed };
}

// ─────────────────────────────────────────────────────────────────────────────
// State Machine
// ─────────────────────────────────────────────────────────────────────────────

export interface RegisterActivityInput {
  userId: string;
  /** Calendar date of the activity */
  activityDate: string;
  now: Date;
  timeZone: string;
}

export interface RegisterActivityOutput {
  streak: UserStreak;
  transition: StreakTransition;
}

const advance = (
  previous: UserStreak,
  currentStreak: number,
  activityDate: string,
  gracePeriodUsedAt: Date | null
): UserStreak => ({
  ...previous,
  currentStreak,
  longestStreak: Math.max(previous.longestStreak, currentStreak),
  lastActivityDate: activityDate,
  gracePeriodUsedAt,
});

/**
 * Applies one day of activity.
 *
 * | gap from last activity | effect                                   |
 * |------------------------|------------------------------------------|
 * | no record              | streak starts at 1                       |
 * | <= 0                   | unchanged (already counted)              |
 * | 1                      | +1                                       |
 * | 2, grace available     | +1, grace consumed                       |
 * | 2, no grace            | reset to 1                               |
 * | >= 3                   | reset to 1                               |
 */
export function registerActivity(
  previous: UserStreak | null,
  input: RegisterActivityInput
): RegisterActivityOutput {
  const { userId, activityDate, now, timeZone } = input;

  if (previous === null) {
    return {
      streak: {
        userId,
        currentStreak: 1,
        longestStreak: 1,
        lastActivityDate: activityDate,
        gracePeriodUsedAt: null,
      },
      transition: 'started',
    };
  }

  const gap = daysBetween(previous.lastActivityDate, activityDate);

  if (gap <= 0) {
    return { streak: previous, transition: 'unchanged' };
  }

  if (gap === 1) {
    return {
      streak: advance(previous, previous.currentStreak + 1, activityDate, previous.gracePeriodUsedAt),
      transition: 'extended',
    };
  }

  if (gap === 2 && graceStatus(previous, activityDate, timeZone).graceAvailable) {
    return {
      streak: advance(previous, previous.currentStreak + 1, activityDate, now),
      transition: 'grace_extended',
    };
  }

  return {
    streak: advance(previous, 1, activityDate, previous.gracePeriodUsedAt),
    transition: 'reset',
  };
}
