import path from 'node:path';
import { afterAll, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../index.js';

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.PORT;
    delete process.env.HOST;
    delete process.env.LOG_LEVEL;
    delete process.env.API_PUBLIC_URL;
    delete process.env.API_KEY;
    delete process.env.API_TENANT_ID;
    delete process.env.DB_PROVIDER;
    delete process.env.SQLITE_DB_ROOT;
    delete process.env.SQLITE_DB_FILE_PATTERN;
    delete process.env.SQLITE_MIGRATIONS_DIR;
    delete process.env.FANOUT_BATCH_SIZE;
    delete process.env.FANOUT_CLAIM_TTL_MS;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('returns defaults when env vars absent', () => {
    const config = loadConfig();

    expect(config).toEqual({
      server: { port: 3000, host: '0.0.0.0', logLevel: 'info', publicUrl: 'http://localhost:3000' },
      auth: { seedKeys: [{ key: 'dev-key', tenantId: 'dev-tenant' }] },
      persistence: {
        provider: 'sqlite',
        sqlite: {
          dbRoot: path.resolve(process.cwd(), 'data', 'sqlite'),
          filePattern: '{tenantId}.db',
          migrationsDir: path.resolve(process.cwd(), 'migrations', 'sqlite'),
        },
      },
      fanout: { batchSize: 25, claimTtlMs: 300_000 },
    });
  });

  it('honors provided env vars and parses numbers safely', () => {
    process.env.PORT = '8080';
    process.env.LOG_LEVEL = 'debug';
    process.env.API_KEY = 'test-key';
    process.env.API_TENANT_ID = 'tenant-a';
    process.env.DB_PROVIDER = 'MEMORY';
    process.env.SQLITE_DB_ROOT = '/tmp/dbs';
    process.env.FANOUT_BATCH_SIZE = 'not-a-number';

    const config = loadConfig();

    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0', logLevel: 'debug', publicUrl: 'http://localhost:8080' });
    expect(config.auth.seedKeys).toEqual([{ key: 'test-key', tenantId: 'tenant-a' }]);
    expect(config.persistence.provider).toBe('memory');
    expect(config.persistence.sqlite.dbRoot).toBe('/tmp/dbs');
    expect(config.fanout.batchSize).toBe(25);
  });

  it('reads the pending-claim lease from the environment', () => {
    process.env.FANOUT_CLAIM_TTL_MS = '60000';

    expect(loadConfig().fanout.claimTtlMs).toBe(60_000);
  });

  it('falls back to sqlite for unknown providers and clamps the batch size', () => {
    process.env.DB_PROVIDER = 'postgres';
    process.env.FANOUT_BATCH_SIZE = '0';
    process.env.FANOUT_CLAIM_TTL_MS = '-5';

    const config = loadConfig();

    expect(config.persistence.provider).toBe('sqlite');
    expect(config.fanout).toEqual({ batchSize: 1, claimTtlMs: 0 });
  });
});
