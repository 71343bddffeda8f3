import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { DomainError } from './errors.js';

export function handleError(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof DomainError) {
    if (error.statusCode >= 500) {
      request.log.error({ err: error }, error.message);
    }
    return reply.code(error.statusCode).send(error.toResponse());
  }
  if (error instanceof ZodError) {
    return reply.code(400).send({
      error: 'Invalid request',
      code: 'VALIDATION_FAILED',
      issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
  if (statusCode >= 500) {
    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ error: 'Internal Server Error' });
  }
  return reply.code(statusCode).send({ error: error.message });
}

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler(handleError);
}
