import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AttemptManager } from './attempt.service.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { idParamsSchema, passThroughValidator, requireActor } from '../../common/http.js';

const startSchema = z.object({ assessmentId: z.string().min(1) });
const answerSchema = z.object({ questionId: z.string().min(1), choiceId: z.string().min(1) });

const startBodySchema = toJsonSchema(startSchema, 'StartAttemptRequest');
const answerBodySchema = toJsonSchema(answerSchema, 'RecordAnswerRequest');

export interface AttemptRoutesOptions {
  attemptManager: AttemptManager;
}

export async function attemptRoutes(app: FastifyInstance, options: AttemptRoutesOptions) {
  const { attemptManager } = options;

  app.post('/', {
    schema: {
      tags: ['Attempts'],
      summary: 'Start an attempt, or return the existing one',
      body: startBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const learnerId = requireActor(req);
    const { assessmentId } = startSchema.parse(req.body);
    const { attempt, created } = attemptManager.start(req.tenantId, learnerId, assessmentId);
    reply.code(created ? 201 : 200);
    return attempt;
  });

  app.put('/:id/answers', {
    schema: {
      tags: ['Attempts'],
      summary: 'Record or replace the answer to one question',
      body: answerBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async req => {
    const learnerId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    const { questionId, choiceId } = answerSchema.parse(req.body);
    return attemptManager.recordAnswer(req.tenantId, learnerId, id, questionId, choiceId);
  });

  app.post('/:id/complete', { schema: { tags: ['Attempts'], summary: 'Complete and grade an attempt' } }, async req => {
    const learnerId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    return attemptManager.complete(req.tenantId, learnerId, id);
  });

  app.get('/:id', { schema: { tags: ['Attempts'], summary: 'Get an attempt with its answers' } }, async req => {
    const actorId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    return attemptManager.get(req.tenantId, actorId, id);
  });

  app.post('/:id/regrade', { schema: { tags: ['Attempts'], summary: 'Re-run grading for a completed attempt' } }, async req => {
    const ownerId = requireActor(req);
    const { id } = idParamsSchema.parse(req.params);
    return attemptManager.regrade(req.tenantId, ownerId, id);
  });
}
