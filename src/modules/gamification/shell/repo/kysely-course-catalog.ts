/**
 * Course Catalog & Enrollments - Kysely Implementation
 *
 * Read-only access to tables owned by the catalog and enrollment subsystems.
 */

import { ok, err, type Result } from 'neverthrow';

import { createStoreUnavailableError, type GamificationError } from '../../core/errors.js';

import type { Clock, CourseCatalog, EnrollmentChecker } from '../../core/ports.js';
import type { LessonRef } from '../../core/types.js';
import type { DbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

export interface CourseCatalogOptions {
  db: DbClient;
  logger: Logger;
  clock: Clock;
}

class KyselyCourseCatalog implements CourseCatalog, EnrollmentChecker {
  private readonly db: DbClient;
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(options: CourseCatalogOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'course-catalog' });
    this.clock = options.clock;
  }

  async findLesson(lessonId: string): Promise<Result<LessonRef | null, GamificationError>> {
    try {
      const row = await this.db
        .selectFrom('lessons as l')
        .innerJoin('modules as m', 'm.id', 'l.module_id')
        .select(['l.id as lesson_id', 'm.course_id'])
        .where('l.id', '=', lessonId)
        .executeTakeFirst();

      return ok(row === undefined ? null : { lessonId: row.lesson_id, courseId: row.course_id });
    } catch (error) {
      this.log.error({ err: error, lessonId }, 'Failed to look up lesson');
      return err(createStoreUnavailableError('Failed to look up lesson', error));
    }
  }

  async findCourseLessons(courseId: string): Promise<Result<string[] | null, GamificationError>> {
    try {
      const course = await this.db
        .selectFrom('courses')
        .select('id')
        .where('id', '=', courseId)
        .executeTakeFirst();

      if (course === undefined) {
        return ok(null);
      }

      const rows = await this.db
        .selectFrom('lessons as l')
        .innerJoin('modules as m', 'm.id', 'l.module_id')
        .select('l.id')
        .where('m.course_id', '=', courseId)
        .orderBy('m.position', 'asc')
        .orderBy('l.position', 'asc')
        .execute();

      return ok(rows.map((row) => row.id));
    } catch (error) {
      this.log.error({ err: error, courseId }, 'Failed to list course lessons');
      return err(createStoreUnavailableError('Failed to list course lessons', error));
    }
  }

  async isEnrolledInLesson(
    userId: string,
    lessonId: string
  ): Promise<Result<boolean, GamificationError>> {
    const lessonResult = await this.findLesson(lessonId);
    if (lessonResult.isErr()) {
      return err(lessonResult.error);
    }
    // Unknown lessons are reported by the core as NotFound
    if (lessonResult.value === null) {
      return ok(true);
    }
    return this.isEnrolledInCourse(userId, lessonResult.value.courseId);
  }

  async isEnrolledInCourse(
    userId: string,
    courseId: string
  ): Promise<Result<boolean, GamificationError>> {
    try {
      const row = await this.db
        .selectFrom('enrollments')
        .select('course_id')
        .where('user_id', '=', userId)
        .where('course_id', '=', courseId)
        .where((eb) =>
          eb.or([eb('expires_at', 'is', null), eb('expires_at', '>', this.clock.now())])
        )
        .executeTakeFirst();

      return ok(row !== undefined);
    } catch (error) {
      this.log.error({ err: error, userId, courseId }, 'Failed to check enrollment');
      return err(createStoreUnavailableError('Failed to check enrollment', error));
    }
  }
}

/**
 * Creates the catalog reader. The same object answers enrollment checks.
 */
export const makeCourseCatalog = (
  options: CourseCatalogOptions
): CourseCatalog & EnrollmentChecker => {
  return new KyselyCourseCatalog(options);
};
