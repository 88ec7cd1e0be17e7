import {
  errorMessage,
  type Concept,
  type Edge,
  type GraphEntity,
  type GraphStore,
  type Provenance,
  type SearchQuery,
  type SearchRecord,
  type UpsertEntry,
  type UpsertResult,
} from '@sinew/shared';
import { matchesFilters, rankEntities } from '../ranking.js';

export interface ProvenanceLogEntry {
  uuid: string;
  entity: GraphEntity['entity'];
  provenance: Provenance;
}

/**
 * Map-backed store. Entities are cloned on the way in and out so callers never
 * share mutable state with the store.
 */
export class InMemoryGraphStore implements GraphStore {
  private concepts = new Map<string, Concept>();
  private edges = new Map<string, Edge>();
  private log: ProvenanceLogEntry[] = [];

  async upsert(entity: GraphEntity, provenance: Provenance): Promise<UpsertResult> {
    return this.write(entity, provenance);
  }

  async upsertMany(entries: UpsertEntry[]): Promise<UpsertResult[]> {
    return entries.map(e => this.write(e.entity, e.provenance));
  }

  async search(query: SearchQuery): Promise<SearchRecord[]> {
    return rankEntities(this.candidates(query), query);
  }

  /** Direct lookup, for tests and diagnostics. */
  getConcept(uuid: string): Concept | undefined {
    const concept = this.concepts.get(uuid);
    return concept ? structuredClone(concept) : undefined;
  }

  allConcepts(): Concept[] {
    return [...this.concepts.values()].map(c => structuredClone(c));
  }

  allEdges(): Edge[] {
    return [...this.edges.values()].map(e => structuredClone(e));
  }

  provenanceLog(): ProvenanceLogEntry[] {
    return [...this.log];
  }

  private write(entity: GraphEntity, provenance: Provenance): UpsertResult {
    try {
      if (entity.entity === 'concept') {
        this.concepts.set(entity.uuid, structuredClone(entity));
      } else {
        this.edges.set(entity.uuid, structuredClone(entity));
      }
      this.log.push({ uuid: entity.uuid, entity: entity.entity, provenance: { ...provenance } });
      return { status: 'success', uuid: entity.uuid };
    } catch (err) {
      return { status: 'error', uuid: entity.uuid, error: errorMessage(err) };
    }
  }

  private candidates(query: SearchQuery): GraphEntity[] {
    const kind = query.filters?.entity;
    const pool: GraphEntity[] = [];
    if (kind === undefined || kind === 'concept') pool.push(...this.concepts.values());
    if (kind === undefined || kind === 'edge') pool.push(...this.edges.values());
    return pool.filter(e => matchesFilters(e, query.filters));
  }
}
