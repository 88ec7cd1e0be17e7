import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'graph-schema',
  up(db) {
    // ── Concepts ─────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS concepts (
        uuid       TEXT PRIMARY KEY,
        kind       TEXT NOT NULL,
        labels     TEXT NOT NULL DEFAULT '[]',
        props      TEXT NOT NULL DEFAULT '{}',
        embedding  TEXT,
        status     TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_concepts_kind ON concepts(kind)');

    // ── Edges ────────────────────────────────────────────────
    // No foreign keys: a concept written without its edges is a tolerated state.
    db.exec(`
      CREATE TABLE IF NOT EXISTS edges (
        uuid       TEXT PRIMARY KEY,
        from_node  TEXT NOT NULL,
        to_node    TEXT NOT NULL,
        rel        TEXT NOT NULL,
        props      TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_edges_from_rel ON edges(from_node, rel)');
    db.exec('CREATE INDEX IF NOT EXISTS idx_edges_to_rel ON edges(to_node, rel)');

    // ── Provenance ───────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS provenance (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        entity_uuid TEXT NOT NULL,
        entity_type TEXT NOT NULL,
        source      TEXT NOT NULL,
        ts          TEXT NOT NULL,
        confidence  REAL NOT NULL,
        trace_id    TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_provenance_entity ON provenance(entity_uuid)');
    db.exec('CREATE INDEX IF NOT EXISTS idx_provenance_trace ON provenance(trace_id)');
  },
};
