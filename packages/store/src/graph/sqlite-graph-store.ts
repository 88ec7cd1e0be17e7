import type Database from 'better-sqlite3';
import {
  errorMessage,
  type FilterValue,
  type GraphEntity,
  type GraphStore,
  type Provenance,
  type SearchFilters,
  type SearchQuery,
  type SearchRecord,
  type UpsertEntry,
  type UpsertResult,
} from '@sinew/shared';
import { ConceptRepository, type ConceptCriteria } from '../repositories/concept.repository.js';
import { EdgeRepository, type EdgeCriteria } from '../repositories/edge.repository.js';
import { ProvenanceRepository } from '../repositories/provenance.repository.js';
import { matchesFilters, rankEntities } from '../ranking.js';

/**
 * GraphStore over SQLite. Column filters are pushed into SQL; `props.*`
 * filters and ranking run over the loaded candidates.
 */
export class SqliteGraphStore implements GraphStore {
  readonly concepts: ConceptRepository;
  readonly edges: EdgeRepository;
  readonly provenance: ProvenanceRepository;

  constructor(private db: Database.Database) {
    this.concepts = new ConceptRepository(db);
    this.edges = new EdgeRepository(db);
    this.provenance = new ProvenanceRepository(db);
  }

  async upsert(entity: GraphEntity, provenance: Provenance): Promise<UpsertResult> {
    try {
      this.db.transaction(() => this.write(entity, provenance))();
      return { status: 'success', uuid: entity.uuid };
    } catch (err) {
      return { status: 'error', uuid: entity.uuid, error: errorMessage(err) };
    }
  }

  /** All-or-nothing: a failure rolls back every entry in the batch. */
  async upsertMany(entries: UpsertEntry[]): Promise<UpsertResult[]> {
    try {
      this.db.transaction(() => {
        for (const entry of entries) this.write(entry.entity, entry.provenance);
      })();
      return entries.map((e): UpsertResult => ({ status: 'success', uuid: e.entity.uuid }));
    } catch (err) {
      const error = errorMessage(err);
      return entries.map((e): UpsertResult => ({ status: 'error', uuid: e.entity.uuid, error }));
    }
  }

  async search(query: SearchQuery): Promise<SearchRecord[]> {
    const filters = query.filters ?? {};
    const pool: GraphEntity[] = [];
    if (filters.entity === undefined || filters.entity === 'concept') {
      const criteria = conceptCriteria(filters);
      if (criteria) pool.push(...this.concepts.find(criteria));
    }
    if (filters.entity === undefined || filters.entity === 'edge') {
      const criteria = edgeCriteria(filters);
      if (criteria) pool.push(...this.edges.find(criteria));
    }
    return rankEntities(pool.filter(e => matchesFilters(e, query.filters)), query);
  }

  private write(entity: GraphEntity, provenance: Provenance): void {
    if (entity.entity === 'concept') {
      this.concepts.upsert(entity);
    } else {
      this.edges.upsert(entity);
    }
    this.provenance.record(entity, provenance);
  }
}

/** Column criteria for concepts, or null when a filter rules concepts out entirely. */
function conceptCriteria(filters: SearchFilters): ConceptCriteria | null {
  for (const key of ['fromNode', 'toNode', 'rel']) {
    if (filters[key] !== undefined) return null;
  }
  const criteria: ConceptCriteria = {};
  const uuid = asText(filters.uuid);
  const kind = asText(filters.kind);
  const status = asText(filters.status);
  if (uuid !== undefined) criteria.uuid = uuid;
  if (kind !== undefined) criteria.kind = kind;
  if (status !== undefined) criteria.status = status;
  return criteria;
}

function edgeCriteria(filters: SearchFilters): EdgeCriteria | null {
  for (const key of ['kind', 'status']) {
    if (filters[key] !== undefined) return null;
  }
  const criteria: EdgeCriteria = {};
  const uuid = asText(filters.uuid);
  const fromNode = asText(filters.fromNode);
  const toNode = asText(filters.toNode);
  const rel = asText(filters.rel);
  if (uuid !== undefined) criteria.uuid = uuid;
  if (fromNode !== undefined) criteria.fromNode = fromNode;
  if (toNode !== undefined) criteria.toNode = toNode;
  if (rel !== undefined) criteria.rel = rel;
  return criteria;
}

function asText(value: FilterValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
