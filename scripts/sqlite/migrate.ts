import { loadConfig } from '../../src/config/index.js';
import { createSQLiteTenantClient, resolveTenantDbPath } from '../../src/infrastructure/sqlite/client.js';

function parseTenantIds(argv: string[]): string[] {
  const tenantIds = new Set<string>();
  for (const arg of argv) {
    if (arg.startsWith('--tenant=')) {
      tenantIds.add(arg.slice('--tenant='.length));
    }
  }
  if (tenantIds.size === 0) {
    tenantIds.add(process.env.API_TENANT_ID ?? 'dev-tenant');
  }
  return Array.from(tenantIds);
}

async function main() {
  const tenantIds = parseTenantIds(process.argv.slice(2));
  const config = loadConfig();
  const client = createSQLiteTenantClient(config.persistence.sqlite);

  try {
    for (const tenantId of tenantIds) {
      client.getConnection(tenantId);
      const targetPath = resolveTenantDbPath(config.persistence.sqlite, tenantId);
      console.log(`Applied migrations for "${tenantId}" at ${targetPath}`);
    }
  } finally {
    client.closeAll();
  }
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
