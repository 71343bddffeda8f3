import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ParticipantRepository } from './participant.repository.js';
import { createParticipant } from './participant.model.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { PARTICIPANT_LABELS } from '../../common/types.js';
import { NotFoundError } from '../../common/errors.js';
import { idParamsSchema, passThroughValidator } from '../../common/http.js';

const createSchema = z.object({
  email: z.string().email(),
  displayName: z.string().min(1).max(120).optional(),
  label: z.enum(PARTICIPANT_LABELS).optional(),
});

const createParticipantBodySchema = toJsonSchema(createSchema, 'CreateParticipantRequest');

export interface ParticipantRoutesOptions {
  repository: ParticipantRepository;
}

export async function participantRoutes(app: FastifyInstance, options: ParticipantRoutesOptions) {
  const { repository } = options;

  app.post('/', {
    schema: {
      tags: ['Participants'],
      summary: 'Register a participant',
      description: `The label (${PARTICIPANT_LABELS.join(', ')}) is advisory; access is decided by course ownership and enrollment.`,
      body: createParticipantBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const parsed = createSchema.parse(req.body);
    const existing = repository.getByEmail(req.tenantId, parsed.email);
    if (existing) {
      reply.code(409);
      return { error: 'Participant with email already exists' };
    }
    const participant = repository.save(createParticipant({ tenantId: req.tenantId, ...parsed }));
    reply.code(201);
    return participant;
  });

  app.get('/:id', { schema: { tags: ['Participants'], summary: 'Get a participant' } }, async req => {
    const { id } = idParamsSchema.parse(req.params);
    const participant = repository.getById(req.tenantId, id);
    if (!participant) {
      throw new NotFoundError();
    }
    return participant;
  });
}
