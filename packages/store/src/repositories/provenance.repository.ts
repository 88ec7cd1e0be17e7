import type Database from 'better-sqlite3';
import type { GraphEntity, Provenance } from '@sinew/shared';
import { toProvenanceSource } from '../json.js';

export interface ProvenanceRow {
  id: number;
  entity_uuid: string;
  entity_type: string;
  source: string;
  ts: string;
  confidence: number;
  trace_id: string;
}

interface ProvenanceParams {
  entity_uuid: string;
  entity_type: string;
  source: string;
  ts: string;
  confidence: number;
  trace_id: string;
}

/** Append-only write log. Never consulted to decide read visibility. */
export class ProvenanceRepository {
  private insertStmt: Database.Statement<[ProvenanceParams]>;
  private byEntityStmt: Database.Statement<[string], ProvenanceRow>;
  private byTraceStmt: Database.Statement<[string], ProvenanceRow>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<ProvenanceParams>(`
      INSERT INTO provenance (entity_uuid, entity_type, source, ts, confidence, trace_id)
      VALUES (@entity_uuid, @entity_type, @source, @ts, @confidence, @trace_id)
    `);
    this.byEntityStmt = db.prepare<[string], ProvenanceRow>(
      'SELECT * FROM provenance WHERE entity_uuid = ? ORDER BY id ASC',
    );
    this.byTraceStmt = db.prepare<[string], ProvenanceRow>(
      'SELECT * FROM provenance WHERE trace_id = ? ORDER BY id ASC',
    );
  }

  record(entity: GraphEntity, provenance: Provenance): void {
    this.insertStmt.run({
      entity_uuid: entity.uuid,
      entity_type: entity.entity,
      source: provenance.source,
      ts: provenance.ts,
      confidence: provenance.confidence,
      trace_id: provenance.traceId,
    });
  }

  listForEntity(uuid: string): Provenance[] {
    return this.byEntityStmt.all(uuid).map(rowToProvenance);
  }

  /** Entity uuids written under one trace id, in write order. */
  listEntitiesForTrace(traceId: string): string[] {
    return this.byTraceStmt.all(traceId).map(r => r.entity_uuid);
  }
}

function rowToProvenance(row: ProvenanceRow): Provenance {
  return {
    source: toProvenanceSource(row.source),
    ts: row.ts,
    confidence: row.confidence,
    traceId: row.trace_id,
  };
}
