import type { SQLiteDatabase } from '../../src/infrastructure/sqlite/client.js';

// Children before parents.
const TENANT_TABLES = [
  'notifications',
  'progress_completions',
  'progress_aggregates',
  'answers',
  'attempts',
  'assessments',
  'enrollments',
  'lessons',
  'course_modules',
  'courses',
  'participants',
] as const;

export function clearTenantTables(db: SQLiteDatabase, tenantId: string): void {
  for (const table of TENANT_TABLES) {
    db.prepare(`DELETE FROM ${table} WHERE tenant_id = ?`).run(tenantId);
  }
}
