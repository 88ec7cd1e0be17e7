import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

export const DEFAULT_DB_PATH = '.sinew/sinew.db';

let instance: Database.Database | null = null;

export interface DatabaseOptions {
  /** Path to the SQLite database file. Defaults to .sinew/sinew.db */
  dbPath?: string;
}

/**
 * Returns (or creates) the singleton database connection.
 * Pragmas are applied on first call.
 */
export function getDatabase(options?: DatabaseOptions): Database.Database {
  if (instance) return instance;

  const dbPath = options?.dbPath ?? path.join(process.cwd(), DEFAULT_DB_PATH);

  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  applyPragmas(db);

  instance = db;
  return db;
}

export function closeDatabase(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}

/** Fresh isolated in-memory database, for tests. */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  applyPragmas(db);
  return db;
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -16000');       // 16 MB
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  db.pragma('temp_store = MEMORY');
}
