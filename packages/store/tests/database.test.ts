import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTestDatabase, getDatabase, closeDatabase } from '../src/database.js';

afterEach(() => {
  closeDatabase();
});

describe('createTestDatabase', () => {
  it('creates an open in-memory database', () => {
    const db = createTestDatabase();
    expect(db.open).toBe(true);
    expect(db.memory).toBe(true);
    db.close();
  });

  it('enables foreign keys', () => {
    const db = createTestDatabase();
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    db.close();
  });

  it('creates isolated databases per call', () => {
    const db1 = createTestDatabase();
    const db2 = createTestDatabase();
    db1.exec('CREATE TABLE scratch (id INTEGER)');

    const tables = db2.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='scratch'").all();
    expect(tables).toHaveLength(0);

    db1.close();
    db2.close();
  });
});

describe('getDatabase', () => {
  it('creates the parent directory and reuses the singleton', () => {
    const dir = mkdtempSync(join(tmpdir(), 'sinew-db-'));
    try {
      const dbPath = join(dir, 'nested', 'graph.db');
      const first = getDatabase({ dbPath });
      const second = getDatabase({ dbPath: join(dir, 'other.db') });
      expect(second).toBe(first);
      expect(first.name).toBe(dbPath);
    } finally {
      closeDatabase();
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
