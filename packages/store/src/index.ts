// ── Database & Migrations ────────────────────────────────────────
export { getDatabase, closeDatabase, createTestDatabase, DEFAULT_DB_PATH } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { ConceptRepository } from './repositories/concept.repository.js';
export type { ConceptRow, ConceptCriteria } from './repositories/concept.repository.js';

export { EdgeRepository } from './repositories/edge.repository.js';
export type { EdgeRow, EdgeCriteria } from './repositories/edge.repository.js';

export { ProvenanceRepository } from './repositories/provenance.repository.js';
export type { ProvenanceRow } from './repositories/provenance.repository.js';

export { TraceRepository } from './repositories/trace.repository.js';
export type { TraceData, SpanData, EventData, TraceListEntry } from './repositories/trace.repository.js';

// ── Graph stores ─────────────────────────────────────────────────
export { InMemoryGraphStore } from './graph/memory-graph-store.js';
export type { ProvenanceLogEntry } from './graph/memory-graph-store.js';
export { SqliteGraphStore } from './graph/sqlite-graph-store.js';
export { matchesFilters, rankEntities, textScore, searchableText } from './ranking.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { getDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';
import { TraceRepository } from './repositories/trace.repository.js';
import { SqliteGraphStore } from './graph/sqlite-graph-store.js';

export interface SinewStore {
  db: Database.Database;
  graph: SqliteGraphStore;
  traces: TraceRepository;
}

/**
 * Open (or create) the database, run migrations, and return the graph store
 * and trace repository.
 *
 * @param dbPath - Defaults to `.sinew/sinew.db` under the working directory.
 */
export function initializeStore(dbPath?: string): SinewStore {
  const db = getDatabase(dbPath ? { dbPath } : undefined);
  runMigrations(db, allMigrations);

  return {
    db,
    graph: new SqliteGraphStore(db),
    traces: new TraceRepository(db),
  };
}
