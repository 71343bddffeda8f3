import type { FastifyInstance } from 'fastify';
import type { EnrollmentRepository } from './enrollment.repository.js';
import { createEnrollment } from './enrollment.model.js';
import type { CourseRepository } from '../courses/course.repository.js';
import type { AccessGuard } from '../access/access.guard.js';
import { idParamsSchema, requireActor } from '../../common/http.js';
import { AccessDeniedError, ValidationError } from '../../common/errors.js';

export interface EnrollmentRoutesOptions {
  repository: EnrollmentRepository;
  courseRepository: CourseRepository;
  accessGuard: AccessGuard;
}

/** Registered under the `/courses` prefix next to the course routes. */
export async function enrollmentRoutes(app: FastifyInstance, options: EnrollmentRoutesOptions) {
  const { repository, courseRepository, accessGuard } = options;

  app.post('/:id/enrollments', { schema: { tags: ['Enrollments'], summary: 'Enroll the caller in a course' } }, async (req, reply) => {
    const enrolleeId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    const course = courseRepository.getById(req.tenantId, id);
    if (!course) {
      throw new AccessDeniedError();
    }
    if (accessGuard.isOwner(enrolleeId, course)) {
      throw new ValidationError('Course owners cannot enroll in their own course');
    }
    const { record, created } = repository.insertIfAbsent(createEnrollment({
      tenantId: req.tenantId,
      courseId: course.id,
      enrolleeId,
    }));
    if (created) {
      req.log.info({ courseId: course.id, enrolleeId }, 'Participant enrolled');
    }
    reply.code(created ? 201 : 200);
    return record;
  });

  app.delete('/:id/enrollments/me', { schema: { tags: ['Enrollments'], summary: 'Withdraw the caller from a course' } }, async (req, reply) => {
    const enrolleeId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    if (!repository.delete(req.tenantId, id, enrolleeId)) {
      throw new AccessDeniedError();
    }
    return reply.code(204).send();
  });

  app.get('/:id/enrollments', { schema: { tags: ['Enrollments'], summary: 'List enrollments (course owner)' } }, async req => {
    const ownerId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    accessGuard.requireCourseOwner(req.tenantId, ownerId, id);
    return repository.listByCourse(req.tenantId, id);
  });
}
