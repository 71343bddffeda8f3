import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createAssessment, findChoiceIntegrityIssues, publishAssessment, toLearnerView } from './assessment.model.js';
import type { AssessmentRepository } from './assessment.repository.js';
import type { AccessGuard } from '../access/access.guard.js';
import type { AttemptManager } from '../attempts/attempt.service.js';
import type { InMemoryEventBus } from '../../common/event-bus.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { idParamsSchema, passThroughValidator, requireActor } from '../../common/http.js';
import { AccessDeniedError } from '../../common/errors.js';

const choiceSchema = z.object({
  text: z.string().min(1).max(500),
  correct: z.boolean(),
});

const questionSchema = z.object({
  kind: z.enum(['MULTIPLE_CHOICE', 'TRUE_FALSE']),
  prompt: z.string().min(1).max(2000),
  points: z.number().int().nonnegative(),
  choices: z.array(choiceSchema).min(2).max(10),
}).refine(question => question.kind !== 'TRUE_FALSE' || question.choices.length === 2, {
  message: 'TRUE_FALSE questions need exactly two choices',
  path: ['choices'],
});

const createSchema = z.object({
  courseId: z.string().min(1),
  title: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  timeLimitMinutes: z.number().int().positive().optional(),
  questions: z.array(questionSchema).min(1),
});

const createAssessmentBodySchema = toJsonSchema(createSchema, 'CreateAssessmentRequest');

export interface AssessmentRoutesOptions {
  repository: AssessmentRepository;
  accessGuard: AccessGuard;
  attemptManager: AttemptManager;
  eventBus: InMemoryEventBus;
}

export async function assessmentRoutes(app: FastifyInstance, options: AssessmentRoutesOptions) {
  const { repository, accessGuard, attemptManager, eventBus } = options;

  app.post('/', {
    schema: {
      tags: ['Assessments'],
      summary: 'Create a draft assessment for a course you own',
      body: createAssessmentBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const actorId = requireActor(req);
    const parsed = createSchema.parse(req.body);
    accessGuard.requireCourseOwner(req.tenantId, actorId, parsed.courseId);
    const assessment = repository.save(createAssessment({ tenantId: req.tenantId, ...parsed }));
    const issues = findChoiceIntegrityIssues(assessment);
    if (issues.length > 0) {
      req.log.warn({ assessmentId: assessment.id, issues }, 'Questions without exactly one correct choice');
    }
    reply.code(201);
    return assessment;
  });

  app.get('/:id', { schema: { tags: ['Assessments'], summary: 'Get an assessment' } }, async req => {
    const actorId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    const assessment = repository.getById(req.tenantId, id);
    if (!assessment) {
      throw new AccessDeniedError();
    }
    const course = accessGuard.requireCourseAccess(req.tenantId, actorId, assessment.courseId);
    if (accessGuard.isOwner(actorId, course)) {
      return assessment;
    }
    if (assessment.status !== 'published') {
      throw new AccessDeniedError();
    }
    return toLearnerView(assessment);
  });

  app.post('/:id/publish', { schema: { tags: ['Assessments'], summary: 'Publish an assessment and notify enrollees' } }, async (req, reply) => {
    const actorId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    const existing = repository.getById(req.tenantId, id);
    if (!existing) {
      throw new AccessDeniedError();
    }
    accessGuard.requireCourseOwner(req.tenantId, actorId, existing.courseId);
    const published = repository.save(publishAssessment(existing));
    eventBus.publish('ContentPublished', req.tenantId, {
      courseId: published.courseId,
      contentRef: { kind: 'assessment', id: published.id, title: published.title },
    });
    reply.code(202);
    return published;
  });

  app.get('/:id/attempts', { schema: { tags: ['Assessments'], summary: 'List attempts for an assessment (owner)' } }, async req => {
    const actorId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    return attemptManager.listForAssessment(req.tenantId, actorId, id);
  });
}
