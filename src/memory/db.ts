import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.tradeloop', 'tradeloop.sqlite');
const INSTANCES = new Map<string, Database.Database>();

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return readFileSync(join(here, 'schema.sql'), 'utf-8');
}

function ensureDirectory(path: string): void {
  if (path === ':memory:') return;
  mkdirSync(dirname(path), { recursive: true });
}

export function resolveDbPath(dbPath?: string): string {
  return dbPath ?? process.env.TRADELOOP_DB_PATH ?? DEFAULT_DB_PATH;
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = resolveDbPath(dbPath);

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  ensureDirectory(resolvedPath);

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(getSchemaSql());

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = resolveDbPath(dbPath);
  const db = INSTANCES.get(resolvedPath);
  if (!db) return;
  db.close();
  INSTANCES.delete(resolvedPath);
}
