import type { Enrollment } from '../../common/types.js';
import type { InsertResult } from '../../common/repository.js';

export interface EnrollmentRepository {
  /**
   * Stores the enrollment unless one already exists for (enrollee, course), in
   * which case the stored record is returned untouched.
   */
  insertIfAbsent(enrollment: Enrollment): InsertResult<Enrollment>;
  find(tenantId: string, courseId: string, enrolleeId: string): Enrollment | undefined;
  listByCourse(tenantId: string, courseId: string): Enrollment[];
  delete(tenantId: string, courseId: string, enrolleeId: string): boolean;
}

export { createInMemoryEnrollmentRepository } from './enrollment.repository.memory.js';
export { createSQLiteEnrollmentRepository } from './enrollment.repository.sqlite.js';
