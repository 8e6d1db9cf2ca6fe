import type { Generated, ColumnType } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Database-defaulted timestamp: optional on insert (Generated<Timestamp> would nest ColumnTypes)
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// Calendar dates are written as 'YYYY-MM-DD' and always selected back as text (::text)
export type CalendarDate = ColumnType<string, string, string>;

// ─────────────────────────────────────────────────────────────────────────────
// Gamification tables (written only by the gamification module)
// ─────────────────────────────────────────────────────────────────────────────

// One row per (user, lesson). Primary key (user_id, lesson_id).
export interface LessonProgressTable {
  user_id: string;
  lesson_id: string;
  watched_seconds: number;
  last_position_seconds: number;
  completion_percentage: number;
  is_completed: boolean;
  completed_at: Timestamp | null;
  last_updated_at: Timestamp;
  created_at: GeneratedTimestamp;
}

// Append-only ledger.
// Partial unique index on (user_id, reference_type, reference_id) WHERE reference_id IS NOT NULL.
export interface PointsHistoryTable {
  id: Generated<string>; // BIGSERIAL -> string
  user_id: string;
  points: number;
  reason: string;
  reference_type: string;
  reference_id: string | null;
  note: string | null;
  created_at: GeneratedTimestamp;
}

export interface UserPointsTable {
  user_id: string;
  total_points: number;
  level: number;
  points_to_next_level: number;
  last_recomputed_at: Timestamp;
}

export interface UserStreaksTable {
  user_id: string;
  current_streak: number;
  longest_streak: number;
  last_activity_date: CalendarDate;
  grace_period_used_at: Timestamp | null;
  updated_at: GeneratedTimestamp;
}

// Read-only catalog, maintained by the seeder.
export interface AchievementsTable {
  id: string; // UUID
  code: string;
  title: string;
  description: string;
  icon: string | null;
  category: string;
  trigger_kind: string;
  trigger_threshold: number;
  points_reward: number;
  sort_order: number;
  is_active: boolean;
  created_at: GeneratedTimestamp;
}

// Unique (user_id, achievement_id).
export interface UserAchievementsTable {
  id: Generated<string>; // BIGSERIAL -> string
  user_id: string;
  achievement_id: string;
  earned_at: Timestamp;
  // BIGINT: watch-time sums outgrow INTEGER; pg returns int8 as text
  progress_value: ColumnType<string | null, number | null, number | null>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog / enrollment tables (owned by other subsystems, read here)
// ─────────────────────────────────────────────────────────────────────────────

export interface CoursesTable {
  id: string;
  slug: string;
  title: string;
}

export interface ModulesTable {
  id: string;
  course_id: string;
  position: number;
}

export interface LessonsTable {
  id: string;
  module_id: string;
  position: number;
}

export interface EnrollmentsTable {
  user_id: string;
  course_id: string;
  expires_at: Timestamp | null;
}

// Database Schema Interface
// Note: Keys must be lowercase to match PostgreSQL's default identifier handling.
export interface GamificationDatabase {
  lessonprogress: LessonProgressTable;
  pointshistory: PointsHistoryTable;
  userpoints: UserPointsTable;
  userstreaks: UserStreaksTable;
  achievements: AchievementsTable;
  userachievements: UserAchievementsTable;
  courses: CoursesTable;
  modules: ModulesTable;
  lessons: LessonsTable;
  enrollments: EnrollmentsTable;
}
