import type Database from 'better-sqlite3';
import type { Edge } from '@sinew/shared';
import { parseRecord } from '../json.js';

export interface EdgeRow {
  uuid: string;
  from_node: string;
  to_node: string;
  rel: string;
  props: string;  // JSON object
  created_at: string;
}

export interface EdgeCriteria {
  uuid?: string;
  fromNode?: string;
  toNode?: string;
  rel?: string;
}

interface EdgeParams {
  uuid: string;
  from_node: string;
  to_node: string;
  rel: string;
  props: string;
}

export class EdgeRepository {
  private insertStmt: Database.Statement<[EdgeParams]>;
  private getStmt: Database.Statement<[string], EdgeRow>;
  private countStmt: Database.Statement<[], { n: number }>;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare<EdgeParams>(`
      INSERT INTO edges (uuid, from_node, to_node, rel, props)
      VALUES (@uuid, @from_node, @to_node, @rel, @props)
      ON CONFLICT(uuid) DO UPDATE SET
        from_node = excluded.from_node,
        to_node = excluded.to_node,
        rel = excluded.rel,
        props = excluded.props
    `);
    this.getStmt = db.prepare<[string], EdgeRow>('SELECT * FROM edges WHERE uuid = ?');
    this.countStmt = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM edges');
  }

  upsert(edge: Edge): void {
    this.insertStmt.run({
      uuid: edge.uuid,
      from_node: edge.fromNode,
      to_node: edge.toNode,
      rel: edge.rel,
      props: JSON.stringify(edge.props),
    });
  }

  get(uuid: string): Edge | null {
    const row = this.getStmt.get(uuid);
    return row ? rowToEdge(row) : null;
  }

  find(criteria: EdgeCriteria = {}): Edge[] {
    const conditions: string[] = [];
    const params: string[] = [];

    if (criteria.uuid !== undefined) {
      conditions.push('uuid = ?');
      params.push(criteria.uuid);
    }
    if (criteria.fromNode !== undefined) {
      conditions.push('from_node = ?');
      params.push(criteria.fromNode);
    }
    if (criteria.toNode !== undefined) {
      conditions.push('to_node = ?');
      params.push(criteria.toNode);
    }
    if (criteria.rel !== undefined) {
      conditions.push('rel = ?');
      params.push(criteria.rel);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<string[], EdgeRow>(`SELECT * FROM edges ${where} ORDER BY rowid ASC`)
      .all(...params);
    return rows.map(rowToEdge);
  }

  count(): number {
    return this.countStmt.get()?.n ?? 0;
  }
}

function rowToEdge(row: EdgeRow): Edge {
  return {
    entity: 'edge',
    uuid: row.uuid,
    fromNode: row.from_node,
    toNode: row.to_node,
    rel: row.rel,
    props: parseRecord(row.props),
  };
}
