import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';
import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import type { SqliteConfig } from '../../config/index.js';
import { runMigrations } from './migrator.js';

const require = createRequire(import.meta.url);
const sqlJsRoot = path.dirname(require.resolve('sql.js/dist/sql-wasm.wasm'));
const SQL = await initSqlJs({ locateFile: (file: string) => path.join(sqlJsRoot, file) });

export type SQLiteValue = SqlValue;
export type SQLiteRow = Record<string, SqlValue>;

export interface RunResult {
  changes: number;
}

export interface SQLiteStatement {
  run(...parameters: SQLiteValue[]): RunResult;
  get(...parameters: SQLiteValue[]): SQLiteRow | undefined;
  all(...parameters: SQLiteValue[]): SQLiteRow[];
}

export interface SQLiteDatabase {
  prepare(sql: string): SQLiteStatement;
  exec(sql: string): void;
  close(): void;
}

export interface SQLiteTenantClient {
  getConnection(tenantId: string): SQLiteDatabase;
  closeAll(): void;
}

function exportDatabase(db: SqlJsDatabase, filePath: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, Buffer.from(db.export()));
}

function createStatement(db: SqlJsDatabase, sql: string, markDirty: () => void): SQLiteStatement {
  return {
    run: (...parameters) => {
      const stmt = db.prepare(sql);
      try {
        stmt.run(parameters);
      } finally {
        stmt.free();
      }
      const changes = db.getRowsModified();
      if (changes > 0) markDirty();
      return { changes };
    },
    get: (...parameters) => {
      const stmt = db.prepare(sql);
      try {
        stmt.bind(parameters);
        return stmt.step() ? stmt.getAsObject() : undefined;
      } finally {
        stmt.free();
      }
    },
    all: (...parameters) => {
      const stmt = db.prepare(sql);
      const rows: SQLiteRow[] = [];
      try {
        stmt.bind(parameters);
        while (stmt.step()) {
          rows.push(stmt.getAsObject());
        }
      } finally {
        stmt.free();
      }
      return rows;
    },
  };
}

function createAdapter(db: SqlJsDatabase, filePath: string): SQLiteDatabase {
  const markDirty = () => exportDatabase(db, filePath);
  return {
    prepare(sql: string) {
      return createStatement(db, sql, markDirty);
    },
    exec(sql: string) {
      db.exec(sql);
      markDirty();
    },
    close() {
      markDirty();
      db.close();
    },
  };
}

export function resolveTenantDbPath(config: SqliteConfig, tenantId: string): string {
  const safeTenantId = tenantId.replace(/[^a-zA-Z0-9_-]/g, '_');
  const fileName = config.filePattern.replace('{tenantId}', safeTenantId);
  const candidate = path.isAbsolute(fileName) ? fileName : path.join(config.dbRoot, fileName);
  fs.mkdirSync(path.dirname(candidate), { recursive: true });
  return candidate;
}

function openSqlJsDatabase(filePath: string): SqlJsDatabase {
  if (fs.existsSync(filePath)) {
    return new SQL.Database(fs.readFileSync(filePath));
  }
  return new SQL.Database();
}

export function createSQLiteTenantClient(config: SqliteConfig): SQLiteTenantClient {
  const connections = new Map<string, SQLiteDatabase>();
  fs.mkdirSync(config.dbRoot, { recursive: true });

  function getConnection(tenantId: string): SQLiteDatabase {
    const existing = connections.get(tenantId);
    if (existing) {
      return existing;
    }
    const filePath = resolveTenantDbPath(config, tenantId);
    const db = openSqlJsDatabase(filePath);
    const adapter = createAdapter(db, filePath);
    runMigrations(adapter, config.migrationsDir);
    connections.set(tenantId, adapter);
    return adapter;
  }

  function closeAll() {
    const errors: unknown[] = [];
    for (const connection of connections.values()) {
      try {
        connection.close();
      } catch (error) {
        errors.push(error);
      }
    }
    connections.clear();
    if (errors.length > 0) {
      throw new AggregateError(errors, 'Failed to close one or more SQLite connections');
    }
  }

  return { getConnection, closeAll };
}

export function readString(row: SQLiteRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Expected text in column "${column}"`);
  }
  return value;
}

export function readOptionalString(row: SQLiteRow, column: string): string | undefined {
  const value = row[column];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(row: SQLiteRow, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Expected number in column "${column}"`);
  }
  return value;
}

export function readOptionalNumber(row: SQLiteRow, column: string): number | undefined {
  const value = row[column];
  return typeof value === 'number' ? value : undefined;
}
