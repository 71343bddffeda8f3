import type { AuthConfig } from '../../config/index.js';

export type ApiKeyRecord = AuthConfig['seedKeys'][number];

/** Async so a persistent key store can stand behind the same hook. */
export interface ApiKeyStore {
  get(key: string): Promise<ApiKeyRecord | undefined>;
  revoke(key: string): Promise<void>;
}

export function createApiKeyStore(seed: ApiKeyRecord[]): ApiKeyStore {
  const tenantByKey = new Map(seed.map(record => [record.key, record.tenantId]));
  const revoked = new Set<string>();

  return {
    async get(key) {
      const tenantId = tenantByKey.get(key);
      return tenantId === undefined || revoked.has(key) ? undefined : { key, tenantId };
    },
    async revoke(key) {
      if (tenantByKey.has(key)) {
        revoked.add(key);
      }
    },
  };
}
