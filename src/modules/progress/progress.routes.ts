import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ProgressTracker } from './progress.service.js';
import { requireActor } from '../../common/http.js';

const lessonParamsSchema = z.object({ lessonId: z.string().min(1) });
const courseParamsSchema = z.object({ courseId: z.string().min(1) });
const learnerParamsSchema = courseParamsSchema.extend({ learnerId: z.string().min(1) });

export interface ProgressRoutesOptions {
  progressTracker: ProgressTracker;
}

export async function progressRoutes(app: FastifyInstance, options: ProgressRoutesOptions) {
  const { progressTracker } = options;

  app.post('/lessons/:lessonId/complete', {
    schema: { tags: ['Progress'], summary: 'Record that the caller completed a lesson' },
  }, async req => {
    const learnerId = requireActor(req);
    const { lessonId } = lessonParamsSchema.parse(req.params);
    return progressTracker.onLessonCompleted(req.tenantId, learnerId, lessonId);
  });

  app.get('/courses/:courseId/me', { schema: { tags: ['Progress'], summary: 'Progress of the caller in a course' } }, async req => {
    const actorId = requireActor(req);
    const { courseId } = courseParamsSchema.parse(req.params);
    return progressTracker.getAggregate(req.tenantId, actorId, actorId, courseId);
  });

  app.get('/courses/:courseId/learners/:learnerId', {
    schema: { tags: ['Progress'], summary: 'Progress of one learner (course owner)' },
  }, async req => {
    const actorId = requireActor(req);
    const { courseId, learnerId } = learnerParamsSchema.parse(req.params);
    return progressTracker.getAggregate(req.tenantId, actorId, learnerId, courseId);
  });

  app.get('/courses/:courseId', { schema: { tags: ['Progress'], summary: 'Progress of every learner in a course (owner)' } }, async req => {
    const actorId = requireActor(req);
    const { courseId } = courseParamsSchema.parse(req.params);
    return progressTracker.listForCourse(req.tenantId, actorId, courseId);
  });
}
