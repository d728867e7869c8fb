/**
 * SQLite access. One connection per unit of work: every helper opens a
 * handle, runs, and closes it. No handle outlives the call that opened it,
 * so the foreground loop and the background scanner never share a cursor.
 */
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { DB_PATH } from './config.js';
import { createMemorySchema } from './memory-db.js';
import { createScarSchema } from './scar-db.js';

let dbPath = DB_PATH;

function openConnection(): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  return db;
}

/** Run `fn` against a fresh connection that is closed afterwards. */
export function withDb<T>(fn: (db: Database.Database) => T): T {
  const db = openConnection();
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/** Like withDb, but `fn` runs inside a single transaction (all-or-nothing). */
export function withTransaction<T>(fn: (db: Database.Database) => T): T {
  return withDb((db) => db.transaction(() => fn(db))());
}

export function getDatabasePath(): string {
  return dbPath;
}

export function initDatabase(filePath: string = DB_PATH): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  dbPath = filePath;
  withDb((db) => {
    createMemorySchema(db);
    createScarSchema(db);
  });
}

/** @internal - for tests only. Points the store at a fresh temporary file. */
export function _initTestDatabase(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vigil-test-'));
  const file = path.join(dir, 'test.db');
  initDatabase(file);
  return file;
}
