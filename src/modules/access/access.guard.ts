import type { Course } from '../../common/types.js';
import { AccessDeniedError, ForbiddenError } from '../../common/errors.js';
import type { CourseRepository } from '../courses/course.repository.js';
import type { EnrollmentRepository } from '../enrollments/enrollment.repository.js';

export interface AccessGuard {
  /** Owner or enrolled participant. A missing course is simply not accessible. */
  canAccess(tenantId: string, participantId: string, course: Course | undefined): boolean;
  isOwner(participantId: string, course: Course): boolean;
  /** Throws {@link AccessDeniedError} for both unknown and inaccessible courses. */
  requireCourseAccess(tenantId: string, participantId: string, courseId: string): Course;
  requireCourseOwner(tenantId: string, participantId: string, courseId: string): Course;
}

export interface AccessGuardDependencies {
  courseRepository: CourseRepository;
  enrollmentRepository: EnrollmentRepository;
}

export function createAccessGuard({ courseRepository, enrollmentRepository }: AccessGuardDependencies): AccessGuard {
  const isOwner = (participantId: string, course: Course) => course.ownerId === participantId;

  const canAccess = (tenantId: string, participantId: string, course: Course | undefined) => {
    if (!course || course.tenantId !== tenantId) {
      return false;
    }
    return isOwner(participantId, course) || enrollmentRepository.find(tenantId, course.id, participantId) !== undefined;
  };

  const requireCourseAccess = (tenantId: string, participantId: string, courseId: string) => {
    const course = courseRepository.getById(tenantId, courseId);
    if (!course || !canAccess(tenantId, participantId, course)) {
      throw new AccessDeniedError();
    }
    return course;
  };

  return {
    canAccess,
    isOwner,
    requireCourseAccess,
    requireCourseOwner(tenantId, participantId, courseId) {
      const course = requireCourseAccess(tenantId, participantId, courseId);
      if (!isOwner(participantId, course)) {
        throw new ForbiddenError('Only the course owner can perform this action');
      }
      return course;
    },
  };
}
