import type { FastifyRequest } from 'fastify';
import { AuthError, TenantError } from '../../common/errors.js';
import type { ApiKeyStore } from './api-key.store.js';
import '../../common/fastify-request.js';

function readHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Resolves the tenant scope and acting participant for a request. The API key
 * pins the tenant; `x-actor-id` names the participant and is left unset when absent
 * so that routes needing an actor can reject the call themselves.
 */
export async function authenticate(req: FastifyRequest, store: ApiKeyStore) {
  const apiKey = readHeader(req.headers['x-api-key']);
  if (!apiKey) {
    throw new AuthError('Missing API key');
  }
  let record;
  try {
    record = await store.get(apiKey);
  } catch (err) {
    req.log.error({ err }, 'Failed to resolve API key');
    throw new AuthError('Unable to validate API key', 503);
  }
  if (!record) {
    throw new AuthError('Invalid API key');
  }
  const tenantId = readHeader(req.headers['x-tenant-id']);
  if (!tenantId) {
    throw new TenantError('Missing x-tenant-id header');
  }
  if (tenantId !== record.tenantId) {
    throw new TenantError('Tenant mismatch for API key', 403);
  }
  req.tenantId = tenantId;
  req.actorId = readHeader(req.headers['x-actor-id']);
}

export function createAuthHook(store: ApiKeyStore, publicPrefixes: string[] = ['/health', '/docs']) {
  return async (req: FastifyRequest) => {
    const path = req.url.split('?')[0] ?? req.url;
    if (publicPrefixes.some(prefix => path === prefix || path.startsWith(`${prefix}/`))) {
      return;
    }
    await authenticate(req, store);
  };
}
