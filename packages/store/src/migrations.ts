import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

/**
 * Run all pending migrations in order, each in its own transaction.
 * Creates the _migrations tracking table if it doesn't exist.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name    TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const currentVersion = readVersion(db);
  const sorted = [...migrations].sort((a, b) => a.version - b.version);
  const record = db.prepare<[number, string]>('INSERT INTO _migrations (version, name) VALUES (?, ?)');

  for (const migration of sorted) {
    if (migration.version <= currentVersion) continue;

    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
  }
}

/** Highest applied migration version, or 0 if none. */
export function getCurrentVersion(db: Database.Database): number {
  try {
    return readVersion(db);
  } catch {
    // No _migrations table yet
    return 0;
  }
}

function readVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { v: number }>('SELECT COALESCE(MAX(version), 0) AS v FROM _migrations')
    .get();
  return row?.v ?? 0;
}
