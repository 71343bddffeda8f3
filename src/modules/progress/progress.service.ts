import type { FastifyBaseLogger } from 'fastify';
import type { ProgressAggregate } from '../../common/types.js';
import { AccessDeniedError } from '../../common/errors.js';
import type { InMemoryEventBus } from '../../common/event-bus.js';
import type { AccessGuard } from '../access/access.guard.js';
import type { CourseRepository } from '../courses/course.repository.js';
import type { ProgressRepository } from './progress.repository.js';
import { emptyAggregate } from './progress.model.js';

export interface ProgressTrackerDependencies {
  progressRepository: ProgressRepository;
  courseRepository: CourseRepository;
  accessGuard: AccessGuard;
  eventBus: InMemoryEventBus;
  logger: FastifyBaseLogger;
}

export interface LessonCompletionResult {
  aggregate: ProgressAggregate;
  /** False when the lesson was already in the completed set. */
  added: boolean;
}

export interface ProgressTracker {
  onLessonCompleted(tenantId: string, learnerId: string, lessonId: string): LessonCompletionResult;
  getAggregate(tenantId: string, actorId: string, learnerId: string, courseId: string): ProgressAggregate;
  listForCourse(tenantId: string, ownerId: string, courseId: string): ProgressAggregate[];
}

export function createProgressTracker(deps: ProgressTrackerDependencies): ProgressTracker {
  const { progressRepository, courseRepository, accessGuard, eventBus, logger } = deps;

  const readAggregate = (tenantId: string, learnerId: string, courseId: string) => {
    const aggregate = progressRepository.get(tenantId, learnerId, courseId);
    if (!aggregate) {
      throw new Error(`Progress aggregate for ${learnerId}/${courseId} is missing`);
    }
    return aggregate;
  };

  return {
    onLessonCompleted(tenantId, learnerId, lessonId) {
      const lesson = courseRepository.getLesson(tenantId, lessonId);
      if (!lesson) {
        throw new AccessDeniedError();
      }
      const course = accessGuard.requireCourseAccess(tenantId, learnerId, lesson.courseId);
      if (lesson.status !== 'published') {
        throw new AccessDeniedError();
      }
      const now = new Date().toISOString();
      const publishedLessons = courseRepository.countPublishedLessons(tenantId, course.id);
      progressRepository.ensureAggregate({
        tenantId,
        learnerId,
        courseId: course.id,
        totalLessons: publishedLessons,
        createdAt: now,
        updatedAt: now,
      });
      const added = progressRepository.addCompletedLesson(tenantId, learnerId, course.id, lesson.id, now);

      // Keep the snapshot current and never below the completed count.
      let aggregate = readAggregate(tenantId, learnerId, course.id);
      const totalLessons = Math.max(publishedLessons, aggregate.completedCount);
      if (totalLessons !== aggregate.totalLessons) {
        progressRepository.updateTotal(tenantId, learnerId, course.id, totalLessons, now);
        aggregate = readAggregate(tenantId, learnerId, course.id);
      }

      if (added) {
        logger.debug({ learnerId, courseId: course.id, lessonId, percentage: aggregate.percentage }, 'Lesson completed');
        eventBus.publish('LessonCompleted', tenantId, {
          learnerId,
          courseId: course.id,
          lessonId: lesson.id,
          percentage: aggregate.percentage,
        });
      }
      return { aggregate, added };
    },

    getAggregate(tenantId, actorId, learnerId, courseId) {
      const course = accessGuard.requireCourseAccess(tenantId, actorId, courseId);
      if (actorId !== learnerId && !accessGuard.isOwner(actorId, course)) {
        throw new AccessDeniedError();
      }
      return progressRepository.get(tenantId, learnerId, courseId)
        ?? emptyAggregate(tenantId, learnerId, courseId, courseRepository.countPublishedLessons(tenantId, courseId));
    },

    listForCourse(tenantId, ownerId, courseId) {
      accessGuard.requireCourseOwner(tenantId, ownerId, courseId);
      return progressRepository.listByCourse(tenantId, courseId);
    },
  };
}
