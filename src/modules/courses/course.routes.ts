import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CourseRepository } from './course.repository.js';
import { buildOutline, createCourse, createLessonDraft, createModuleDraft, publishLesson } from './course.model.js';
import type { AccessGuard } from '../access/access.guard.js';
import type { InMemoryEventBus } from '../../common/event-bus.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { idParamsSchema, passThroughValidator, requireActor } from '../../common/http.js';
import { AccessDeniedError } from '../../common/errors.js';

const createSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
});

const moduleSchema = z.object({
  title: z.string().min(1).max(200),
  position: z.number().int().nonnegative().default(0),
});

const lessonSchema = moduleSchema;

const moduleParamsSchema = idParamsSchema.extend({ moduleId: z.string().min(1) });
const lessonParamsSchema = idParamsSchema.extend({ lessonId: z.string().min(1) });

const createCourseBodySchema = toJsonSchema(createSchema, 'CreateCourseRequest');
const createModuleBodySchema = toJsonSchema(moduleSchema, 'CreateModuleRequest');
const createLessonBodySchema = toJsonSchema(lessonSchema, 'CreateLessonRequest');

export interface CourseRoutesOptions {
  repository: CourseRepository;
  accessGuard: AccessGuard;
  eventBus: InMemoryEventBus;
}

export async function courseRoutes(app: FastifyInstance, options: CourseRoutesOptions) {
  const { repository, accessGuard, eventBus } = options;

  app.post('/', {
    schema: {
      tags: ['Courses'],
      summary: 'Create a course owned by the caller',
      body: createCourseBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const ownerId = requireActor(req);
    const parsed = createSchema.parse(req.body);
    const course = repository.save(createCourse({ tenantId: req.tenantId, ownerId, ...parsed }));
    reply.code(201);
    return course;
  });

  app.get('/', { schema: { tags: ['Courses'], summary: 'Courses owned by the caller' } }, async req => {
    const ownerId = requireActor(req);
    return repository.listByOwner(req.tenantId, ownerId);
  });

  app.get('/:id', { schema: { tags: ['Courses'], summary: 'Get a course (owner or enrollee)' } }, async req => {
    const actorId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    return accessGuard.requireCourseAccess(req.tenantId, actorId, id);
  });

  app.get('/:id/outline', {
    schema: {
      tags: ['Courses'],
      summary: 'Ordered modules and lessons',
      description: 'Draft lessons are included for the course owner only.',
    },
  }, async req => {
    const actorId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    const course = accessGuard.requireCourseAccess(req.tenantId, actorId, id);
    return buildOutline(
      course,
      repository.listModules(req.tenantId, course.id),
      repository.listLessons(req.tenantId, course.id),
      accessGuard.isOwner(actorId, course),
    );
  });

  app.post('/:id/modules', {
    schema: {
      tags: ['Courses'],
      summary: 'Add a module to a course you own',
      body: createModuleBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const ownerId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    const parsed = moduleSchema.parse(req.body);
    const course = accessGuard.requireCourseOwner(req.tenantId, ownerId, id);
    const created = repository.insertModule(createModuleDraft({ tenantId: req.tenantId, courseId: course.id, ...parsed }));
    reply.code(201);
    return created;
  });

  app.post('/:id/modules/:moduleId/lessons', {
    schema: {
      tags: ['Courses'],
      summary: 'Add a draft lesson to a module',
      body: createLessonBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const ownerId = requireActor(req);
    const { id, moduleId } = moduleParamsSchema.parse(req.params);
    const parsed = lessonSchema.parse(req.body);
    const course = accessGuard.requireCourseOwner(req.tenantId, ownerId, id);
    const parent = repository.getModule(req.tenantId, course.id, moduleId);
    if (!parent) {
      throw new AccessDeniedError();
    }
    const lesson = repository.insertLesson(createLessonDraft({
      tenantId: req.tenantId,
      courseId: course.id,
      moduleId: parent.id,
      ...parsed,
    }));
    reply.code(201);
    return lesson;
  });

  app.post('/:id/lessons/:lessonId/publish', {
    schema: { tags: ['Courses'], summary: 'Publish a lesson and notify enrollees' },
  }, async (req, reply) => {
    const ownerId = requireActor(req);
    const { id, lessonId } = lessonParamsSchema.parse(req.params);
    const course = accessGuard.requireCourseOwner(req.tenantId, ownerId, id);
    const lesson = repository.getLesson(req.tenantId, lessonId);
    if (!lesson || lesson.courseId !== course.id) {
      throw new AccessDeniedError();
    }
    const published = repository.saveLesson(publishLesson(lesson));
    eventBus.publish('ContentPublished', req.tenantId, {
      courseId: course.id,
      contentRef: { kind: 'lesson', id: published.id, title: published.title },
    });
    reply.code(202);
    return published;
  });
}
