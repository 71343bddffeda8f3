import path from 'node:path';

export interface AuthConfig {
  seedKeys: Array<{ key: string; tenantId: string }>;
}

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  publicUrl: string;
}

export type PersistenceProvider = 'memory' | 'sqlite';

export interface SqliteConfig {
  dbRoot: string;
  filePattern: string;
  migrationsDir: string;
}

export interface PersistenceConfig {
  provider: PersistenceProvider;
  sqlite: SqliteConfig;
}

export interface FanoutConfig {
  /** Upper bound on concurrent deliveries while fanning out one publish event. */
  batchSize: number;
  /** A `pending` notification older than this is treated as abandoned and may be claimed again. */
  claimTtlMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  auth: AuthConfig;
  persistence: PersistenceConfig;
  fanout: FanoutConfig;
}

function readIntFromEnv(envName: string): number | undefined {
  const raw = process.env[envName];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readProviderFromEnv(envName: string): PersistenceProvider {
  const raw = (process.env[envName] ?? 'sqlite').toLowerCase();
  return raw === 'memory' ? 'memory' : 'sqlite';
}

export function loadConfig(): AppConfig {
  const port = readIntFromEnv('PORT') ?? 3000;
  const host = process.env.HOST || '0.0.0.0';
  const logLevel = process.env.LOG_LEVEL || 'info';
  const publicUrl = process.env.API_PUBLIC_URL || `http://localhost:${port}`;
  const provider = readProviderFromEnv('DB_PROVIDER');
  const dbRoot = process.env.SQLITE_DB_ROOT || path.resolve(process.cwd(), 'data', 'sqlite');
  const filePattern = process.env.SQLITE_DB_FILE_PATTERN || '{tenantId}.db';
  const migrationsDir = process.env.SQLITE_MIGRATIONS_DIR || path.resolve(process.cwd(), 'migrations', 'sqlite');
  const batchSize = Math.max(1, readIntFromEnv('FANOUT_BATCH_SIZE') ?? 25);
  const claimTtlMs = Math.max(0, readIntFromEnv('FANOUT_CLAIM_TTL_MS') ?? 300_000);

  const envSeedKey = process.env.API_KEY;
  const envSeedTenant = process.env.API_TENANT_ID;
  const seedKeys = envSeedKey && envSeedTenant
    ? [{ key: envSeedKey, tenantId: envSeedTenant }]
    : [{ key: 'dev-key', tenantId: 'dev-tenant' }];

  return {
    server: { port, host, logLevel, publicUrl },
    auth: { seedKeys },
    persistence: {
      provider,
      sqlite: { dbRoot, filePattern, migrationsDir },
    },
    fanout: { batchSize, claimTtlMs },
  };
}
