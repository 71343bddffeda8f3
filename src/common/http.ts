import type { FastifyRequest, FastifySchema, FastifySchemaCompiler } from 'fastify';
import { z } from 'zod';
import { AuthError } from './errors.js';
import './fastify-request.js';

export const idParamsSchema = z.object({ id: z.string().min(1) });

/** Route body schemas feed the OpenAPI document only; handlers parse with zod. */
export const passThroughValidator: FastifySchemaCompiler<FastifySchema> = () => {
  return data => ({ value: data });
};

export function requireActor(req: FastifyRequest): string {
  if (!req.actorId) {
    throw new AuthError('Missing x-actor-id header');
  }
  return req.actorId;
}
