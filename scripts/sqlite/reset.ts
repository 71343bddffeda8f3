import { loadConfig } from '../../src/config/index.js';
import { createSQLiteTenantClient } from '../../src/infrastructure/sqlite/client.js';
import { clearTenantTables } from './utils.js';

function parseTenantId(argv: string[]): string {
  for (const arg of argv) {
    if (arg.startsWith('--tenant=')) {
      return arg.slice('--tenant='.length);
    }
  }
  return process.env.API_TENANT_ID ?? 'dev-tenant';
}

async function main() {
  const tenantId = parseTenantId(process.argv.slice(2));
  const config = loadConfig();
  const client = createSQLiteTenantClient(config.persistence.sqlite);
  try {
    const db = client.getConnection(tenantId);
    clearTenantTables(db, tenantId);
    console.log(`Cleared tenant "${tenantId}" data`);
  } finally {
    client.closeAll();
  }
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
