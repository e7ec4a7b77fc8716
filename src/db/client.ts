import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync, readdirSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: DatabaseType;
  db: AppDatabase;
}

// In dev: moduleDir = src/db → migrations at src/db/migrations
// In prod: moduleDir = dist/db → migrations still read from src/db/migrations
const moduleDir = dirname(fileURLToPath(import.meta.url));
const migrationsPath = /[\\/]dist[\\/]db$/.test(moduleDir)
  ? resolve(moduleDir, '../../src/db/migrations')
  : resolve(moduleDir, 'migrations');

/**
 * Open the ledger database and apply the schema. Pass ':memory:' for a
 * throwaway database.
 */
export function createDatabase(path: string): DatabaseHandle {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite: DatabaseType = new Database(path);

  sqlite.pragma('journal_mode = WAL');
  // A reply must be on disk before the cycle reports it
  sqlite.pragma('synchronous = FULL');
  sqlite.pragma('busy_timeout = 5000');

  applyMigrations(sqlite);

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

/**
 * Apply each `.sql` file in `dir` once, in name order. Applied files are
 * listed in `schema_migrations`; each file and its bookkeeping row commit in
 * one transaction.
 */
export function applyMigrations(sqlite: DatabaseType, dir: string = migrationsPath): string[] {
  sqlite.exec(`CREATE TABLE IF NOT EXISTS schema_migrations (
    name TEXT PRIMARY KEY NOT NULL,
    applied_at INTEGER NOT NULL
  )`);

  const applied = new Set(
    sqlite
      .prepare('SELECT name FROM schema_migrations')
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string'),
  );
  const record = sqlite.prepare('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)');

  const pending = readdirSync(dir)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  for (const file of pending) {
    const sql = readFileSync(join(dir, file), 'utf8');
    sqlite.transaction(() => {
      sqlite.exec(sql);
      record.run(file, Date.now());
    })();
  }

  return pending;
}
