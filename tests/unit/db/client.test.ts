import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { getTableConfig } from 'drizzle-orm/sqlite-core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { applyMigrations, createDatabase } from '../../../src/db/client.js';
import { replyRecords } from '../../../src/db/schema.js';

function columnNames(sqlite: Database.Database, table: string): string[] {
  return sqlite
    .prepare(`PRAGMA table_info(${table})`)
    .all()
    .map((row) => (typeof row === 'object' && row !== null && 'name' in row ? String(row.name) : ''));
}

function appliedMigrations(sqlite: Database.Database): unknown[] {
  return sqlite.prepare('SELECT name FROM schema_migrations ORDER BY name').pluck().all();
}

describe('createDatabase', () => {
  it('should create reply_records with the columns of the drizzle schema', () => {
    const { sqlite } = createDatabase(':memory:');

    expect(columnNames(sqlite, 'reply_records').sort()).toEqual(
      getTableConfig(replyRecords)
        .columns.map((column) => column.name)
        .sort(),
    );
    expect(appliedMigrations(sqlite)).toEqual(['001-reply-records.sql']);
    sqlite.close();
  });
});

describe('applyMigrations', () => {
  let dir: string;
  let migrationsDir: string;
  let dbPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'review-migrations-'));
    migrationsDir = join(dir, 'migrations');
    dbPath = join(dir, 'test.sqlite');
    mkdirSync(migrationsDir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeMigration(name: string, sql: string) {
    writeFileSync(join(migrationsDir, name), sql);
  }

  it('should apply each file once across reopens', () => {
    writeMigration('001-notes.sql', 'CREATE TABLE notes (id INTEGER PRIMARY KEY);');
    writeMigration('002-notes-body.sql', 'ALTER TABLE notes ADD COLUMN body TEXT;');

    const first = new Database(dbPath);
    expect(applyMigrations(first, migrationsDir)).toEqual(['001-notes.sql', '002-notes-body.sql']);
    first.close();

    const second = new Database(dbPath);
    expect(applyMigrations(second, migrationsDir)).toEqual([]);
    expect(columnNames(second, 'notes')).toEqual(['id', 'body']);
    second.close();
  });

  it('should apply only files added since the last open', () => {
    writeMigration('001-notes.sql', 'CREATE TABLE notes (id INTEGER PRIMARY KEY);');
    const first = new Database(dbPath);
    applyMigrations(first, migrationsDir);
    first.close();

    writeMigration('002-notes-body.sql', 'ALTER TABLE notes ADD COLUMN body TEXT;');
    const second = new Database(dbPath);

    expect(applyMigrations(second, migrationsDir)).toEqual(['002-notes-body.sql']);
    expect(appliedMigrations(second)).toEqual(['001-notes.sql', '002-notes-body.sql']);
    second.close();
  });

  it('should roll back a migration that fails part way', () => {
    writeMigration('001-notes.sql', 'CREATE TABLE notes (id INTEGER PRIMARY KEY);');
    writeMigration(
      '002-broken.sql',
      'ALTER TABLE notes ADD COLUMN body TEXT;\nINSERT INTO missing_table VALUES (1);',
    );
    const sqlite = new Database(dbPath);

    expect(() => applyMigrations(sqlite, migrationsDir)).toThrow('no such table: missing_table');
    expect(columnNames(sqlite, 'notes')).toEqual(['id']);
    expect(appliedMigrations(sqlite)).toEqual(['001-notes.sql']);
    sqlite.close();
  });
});
