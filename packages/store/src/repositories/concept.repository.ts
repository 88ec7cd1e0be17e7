import type Database from 'better-sqlite3';
import type { Concept } from '@sinew/shared';
import { parseRecord, parseStringArray, parseVector } from '../json.js';

export interface ConceptRow {
  uuid: string;
  kind: string;
  labels: string;      // JSON array
  props: string;       // JSON object
  embedding: string | null;  // JSON array
  status: string | null;
  created_at: string;
  updated_at: string;
}

export interface ConceptCriteria {
  uuid?: string;
  kind?: string;
  status?: string;
}

interface ConceptParams {
  uuid: string;
  kind: string;
  labels: string;
  props: string;
  embedding: string | null;
  status: string | null;
  now: string;
}

export class ConceptRepository {
  private upsertStmt: Database.Statement<[ConceptParams]>;
  private getStmt: Database.Statement<[string], ConceptRow>;
  private countStmt: Database.Statement<[], { n: number }>;

  constructor(private db: Database.Database) {
    this.upsertStmt = db.prepare<ConceptParams>(`
      INSERT INTO concepts (uuid, kind, labels, props, embedding, status, created_at, updated_at)
      VALUES (@uuid, @kind, @labels, @props, @embedding, @status, @now, @now)
      ON CONFLICT(uuid) DO UPDATE SET
        kind = excluded.kind,
        labels = excluded.labels,
        props = excluded.props,
        embedding = excluded.embedding,
        status = excluded.status,
        updated_at = excluded.updated_at
    `);
    this.getStmt = db.prepare<[string], ConceptRow>('SELECT * FROM concepts WHERE uuid = ?');
    this.countStmt = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM concepts');
  }

  /** Insert or replace in place; the row keeps its original insertion position. */
  upsert(concept: Concept): void {
    this.upsertStmt.run({
      uuid: concept.uuid,
      kind: concept.kind,
      labels: JSON.stringify(concept.labels),
      props: JSON.stringify(concept.props),
      embedding: concept.embedding && concept.embedding.length > 0 ? JSON.stringify(concept.embedding) : null,
      status: concept.status ?? null,
      now: new Date().toISOString(),
    });
  }

  get(uuid: string): Concept | null {
    const row = this.getStmt.get(uuid);
    return row ? rowToConcept(row) : null;
  }

  find(criteria: ConceptCriteria = {}): Concept[] {
    const conditions: string[] = [];
    const params: string[] = [];

    if (criteria.uuid !== undefined) {
      conditions.push('uuid = ?');
      params.push(criteria.uuid);
    }
    if (criteria.kind !== undefined) {
      conditions.push('kind = ?');
      params.push(criteria.kind);
    }
    if (criteria.status !== undefined) {
      conditions.push('status = ?');
      params.push(criteria.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<string[], ConceptRow>(`SELECT * FROM concepts ${where} ORDER BY rowid ASC`)
      .all(...params);
    return rows.map(rowToConcept);
  }

  count(): number {
    return this.countStmt.get()?.n ?? 0;
  }
}

function rowToConcept(row: ConceptRow): Concept {
  const concept: Concept = {
    entity: 'concept',
    uuid: row.uuid,
    kind: row.kind,
    labels: parseStringArray(row.labels),
    props: parseRecord(row.props),
  };
  const embedding = parseVector(row.embedding);
  if (embedding) concept.embedding = embedding;
  if (row.status !== null) concept.status = row.status;
  return concept;
}
