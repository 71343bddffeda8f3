import fs from 'node:fs';
import path from 'node:path';
import type { SQLiteDatabase } from './client.js';

function ensureMigrationsTable(db: SQLiteDatabase) {
  db.exec(`CREATE TABLE IF NOT EXISTS __migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`);
}

export function listMigrationFiles(migrationsDir: string): string[] {
  const resolvedDir = path.resolve(migrationsDir);
  if (!fs.existsSync(resolvedDir)) {
    throw new Error(`SQLite migrations directory not found: ${resolvedDir}`);
  }
  return fs
    .readdirSync(resolvedDir)
    .filter(name => name.endsWith('.sql'))
    .sort();
}

export function runMigrations(db: SQLiteDatabase, migrationsDir: string): string[] {
  if (!migrationsDir) {
    throw new Error('SQLite migrations directory not configured');
  }
  ensureMigrationsTable(db);
  const applied: string[] = [];
  for (const file of listMigrationFiles(migrationsDir)) {
    const alreadyApplied = db.prepare('SELECT 1 AS applied FROM __migrations WHERE name = ? LIMIT 1').get(file);
    if (alreadyApplied) {
      continue;
    }
    // Strip UTF-8 BOM characters some editors leave behind
    const sql = fs.readFileSync(path.join(path.resolve(migrationsDir), file), 'utf8').replace(/\ufeff/g, '');
    try {
      db.exec(sql);
    } catch (error) {
      throw new Error(`Migration ${file} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    db.prepare('INSERT INTO __migrations (name, applied_at) VALUES (?, ?)').run(file, new Date().toISOString());
    applied.push(file);
  }
  return applied;
}
