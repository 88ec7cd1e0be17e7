import { createTestDatabase } from '../src/database.js';
import { runMigrations } from '../src/migrations.js';
import { allMigrations } from '../src/migrations/index.js';
import { SqliteGraphStore } from '../src/graph/sqlite-graph-store.js';
import type Database from 'better-sqlite3';

/** Fresh in-memory database with all migrations applied. */
export function freshDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  return db;
}

export function freshSqliteStore(): SqliteGraphStore {
  return new SqliteGraphStore(freshDb());
}
