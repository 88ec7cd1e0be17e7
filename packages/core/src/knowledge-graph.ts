import {
  createConcept,
  createEdge,
  createProvenance,
  errorMessage,
  isVector,
  StorageError,
  EXHAUSTIVE_TOP_K,
  REL,
  PROP,
  type Concept,
  type Edge,
  type EmbedFn,
  type GraphEntity,
  type GraphStore,
  type Props,
  type Provenance,
  type SearchFilters,
  type UpsertResult,
} from '@sinew/shared';
import type { TraceLogger } from './trace-logger.js';

export interface KnowledgeGraphOptions {
  embed?: EmbedFn;
  tracer?: TraceLogger;
}

export interface ConceptHit {
  concept: Concept;
  score: number;
}

export interface ConceptSearchOptions {
  topK?: number;
  filters?: SearchFilters;
  embedding?: number[];
}

/**
 * Read and write helpers over a {@link GraphStore}. Everything here goes through
 * `upsert` and `search`; there is no other path to the backend.
 */
export class KnowledgeGraph {
  readonly store: GraphStore;
  readonly tracer?: TraceLogger;
  private embedFn?: EmbedFn;

  constructor(store: GraphStore, options: KnowledgeGraphOptions = {}) {
    this.store = store;
    this.embedFn = options.embed;
    this.tracer = options.tracer;
  }

  get canEmbed(): boolean {
    return this.embedFn !== undefined;
  }

  async getConcept(uuid: string): Promise<Concept | null> {
    const results = await this.store.search({
      text: '',
      topK: 1,
      filters: { entity: 'concept', uuid },
    });
    for (const r of results) {
      if (r.entity === 'concept') return stripScore(r);
    }
    return null;
  }

  async edgesFrom(uuid: string, rel?: string): Promise<Edge[]> {
    return this.findEdges(rel ? { fromNode: uuid, rel } : { fromNode: uuid });
  }

  async edgesTo(uuid: string, rel?: string): Promise<Edge[]> {
    return this.findEdges(rel ? { toNode: uuid, rel } : { toNode: uuid });
  }

  async searchConcepts(text: string, options: ConceptSearchOptions = {}): Promise<ConceptHit[]> {
    const results = await this.store.search({
      text,
      topK: options.topK ?? 10,
      filters: { ...options.filters, entity: 'concept' },
      embedding: options.embedding,
    });
    const hits: ConceptHit[] = [];
    for (const r of results) {
      if (r.entity === 'concept') hits.push({ concept: stripScore(r), score: r.score });
    }
    return hits;
  }

  /** Single write; failures are logged and returned, never thrown. */
  async write(entity: GraphEntity, provenance: Provenance): Promise<UpsertResult> {
    let result: UpsertResult;
    try {
      result = await this.store.upsert(entity, provenance);
    } catch (err) {
      result = { status: 'error', uuid: entity.uuid, error: errorMessage(err) };
    }
    if (result.status === 'error') {
      this.tracer?.logEvent(provenance.traceId, 'write_failed', {
        uuid: entity.uuid,
        entity: entity.entity,
        error: result.error,
      });
    }
    return result;
  }

  /**
   * Write entities in order, as one batch when the backend supports it.
   * Throws {@link StorageError} on the first failure.
   */
  async save(entities: GraphEntity[], provenance: Provenance): Promise<void> {
    if (entities.length === 0) return;

    if (this.store.upsertMany) {
      let results: UpsertResult[];
      try {
        results = await this.store.upsertMany(entities.map(entity => ({ entity, provenance })));
      } catch (err) {
        throw new StorageError('upsertMany', errorMessage(err));
      }
      for (const r of results) {
        if (r.status === 'error') this.failWrite(r.uuid, r.error, provenance);
      }
      return;
    }

    for (const entity of entities) {
      const r = await this.write(entity, provenance);
      if (r.status === 'error') throw new StorageError('upsert', `${r.uuid}: ${r.error}`);
    }
  }

  async putConcept(concept: Concept, provenance: Provenance): Promise<Concept> {
    await this.save([concept], provenance);
    return concept;
  }

  async link(
    fromNode: string,
    toNode: string,
    rel: string,
    props: Props,
    provenance: Provenance,
  ): Promise<Edge> {
    const edge = createEdge(fromNode, toNode, rel, props);
    await this.save([edge], provenance);
    return edge;
  }

  /**
   * Instantiate a prototype: a `Concept` carrying `prototype_uuid` plus an
   * `instantiates` edge back to the prototype.
   */
  async createInstance(
    prototypeUuid: string,
    props: Props,
    options: { kind?: string; labels?: string[]; embedding?: number[]; provenance?: Provenance } = {},
  ): Promise<Concept> {
    const provenance = options.provenance ?? createProvenance('user');
    const concept = createConcept({
      kind: options.kind ?? 'Concept',
      labels: options.labels ?? labelsFrom(props),
      props: { ...props, [PROP.PROTOTYPE_UUID]: prototypeUuid },
      embedding: options.embedding,
    });
    await this.save([concept, createEdge(concept.uuid, prototypeUuid, REL.INSTANTIATES)], provenance);
    return concept;
  }

  /** Fuzzy association: a free-form edge whose strength is clamped to [0,1]. */
  async addAssociation(
    fromNode: string,
    toNode: string,
    label: string,
    strength: number,
    provenance: Provenance = createProvenance('user'),
  ): Promise<Edge> {
    return this.link(fromNode, toNode, label, { strength }, provenance);
  }

  /**
   * Embed text, or `undefined` when no embedding function is configured or it
   * fails. Both cases are logged as degradations.
   */
  async embed(text: string, traceId: string): Promise<number[] | undefined> {
    if (!this.embedFn) {
      this.tracer?.logDegradation(traceId, 'no embedding function', { text });
      return undefined;
    }
    try {
      const vector = await this.embedFn(text);
      if (isVector(vector) && vector.length > 0) return vector;
      this.tracer?.logDegradation(traceId, 'embedding function returned no vector', { text });
    } catch (err) {
      this.tracer?.logDegradation(traceId, 'embedding function failed', { text, error: errorMessage(err) });
    }
    return undefined;
  }

  private async findEdges(filters: SearchFilters): Promise<Edge[]> {
    const results = await this.store.search({
      text: '',
      topK: EXHAUSTIVE_TOP_K,
      filters: { ...filters, entity: 'edge' },
    });
    const edges: Edge[] = [];
    for (const r of results) {
      if (r.entity === 'edge') edges.push(stripScore(r));
    }
    return edges;
  }

  private failWrite(uuid: string, error: string, provenance: Provenance): never {
    this.tracer?.logEvent(provenance.traceId, 'write_failed', { uuid, error });
    throw new StorageError('upsertMany', `${uuid}: ${error}`);
  }
}

function stripScore(record: Concept & { score: number }): Concept;
function stripScore(record: Edge & { score: number }): Edge;
function stripScore(record: GraphEntity & { score: number }): GraphEntity {
  const { score: _score, ...entity } = record;
  return entity;
}

function labelsFrom(props: Props): string[] {
  const name = props.name;
  return typeof name === 'string' && name ? [name] : [];
}
