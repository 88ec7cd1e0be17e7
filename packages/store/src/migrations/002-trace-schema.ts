import type { Migration } from '../migrations.js';

export const migration002: Migration = {
  version: 2,
  name: 'trace-schema',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS traces (
        trace_id     TEXT PRIMARY KEY,
        label        TEXT NOT NULL,
        started_at   TEXT NOT NULL,
        completed_at TEXT,
        duration_ms  REAL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_traces_started ON traces(started_at)');

    db.exec(`
      CREATE TABLE IF NOT EXISTS trace_spans (
        id             TEXT PRIMARY KEY,
        trace_id       TEXT NOT NULL REFERENCES traces(trace_id) ON DELETE CASCADE,
        parent_span_id TEXT,
        name           TEXT NOT NULL,
        start_time     REAL NOT NULL,
        end_time       REAL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_spans_trace ON trace_spans(trace_id)');

    db.exec(`
      CREATE TABLE IF NOT EXISTS trace_events (
        id         TEXT PRIMARY KEY,
        trace_id   TEXT NOT NULL REFERENCES traces(trace_id) ON DELETE CASCADE,
        span_id    TEXT,
        type       TEXT NOT NULL,
        timestamp  REAL NOT NULL,
        wall_clock TEXT NOT NULL,
        duration   REAL,
        data       TEXT
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_events_trace ON trace_events(trace_id)');
  },
};
