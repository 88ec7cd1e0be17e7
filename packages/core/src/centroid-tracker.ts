import {
  PROP,
  REL,
  createEdge,
  createProvenance,
  cosineSimilarity,
  isVector,
  readNumber,
  vectorAdd,
  vectorScale,
  type CentroidRecompute,
  type CentroidUpdate,
  type GraphEntity,
  type Provenance,
} from '@sinew/shared';
import type { KnowledgeGraph } from './knowledge-graph.js';

export interface Centroid {
  embedding: number[];
  exemplarCount: number;
}

/**
 * Keeps a concept's embedding at the mean of its exemplars using a running
 * sum and count stored in its props.
 *
 * Updates are read-modify-write. Callers sharing a store across processes
 * need last-writer-wins or their own lock.
 */
export class CentroidTracker {
  constructor(private graph: KnowledgeGraph) {}

  async addExemplar(
    conceptUuid: string,
    exemplarEmbedding: number[],
    exemplarUuid?: string,
    provenance: Provenance = createProvenance('system'),
  ): Promise<CentroidUpdate> {
    const concept = await this.graph.getConcept(conceptUuid);
    if (!concept) {
      return { updated: false, exemplarCount: 0, embeddingDrift: 0, error: `Concept not found: ${conceptUuid}` };
    }
    if (exemplarEmbedding.length === 0) {
      return {
        updated: false,
        exemplarCount: readNumber(concept.props, PROP.EXEMPLAR_COUNT) ?? 0,
        embeddingDrift: 0,
        error: 'Exemplar embedding is empty',
      };
    }

    const previous = concept.embedding;
    const storedSum = concept.props[PROP.EMBEDDING_SUM];
    let sum: number[] | undefined = isVector(storedSum) ? storedSum : undefined;
    let count = readNumber(concept.props, PROP.EXEMPLAR_COUNT) ?? 0;
    if (!sum || count === 0) {
      // First tracked update: the concept's own embedding counts as one exemplar.
      sum = previous && previous.length > 0 ? [...previous] : [];
      count = sum.length > 0 ? 1 : 0;
    }

    if (sum.length > 0 && sum.length !== exemplarEmbedding.length) {
      return { updated: false, exemplarCount: count, embeddingDrift: 0, error: 'dimension mismatch' };
    }

    const nextSum = vectorAdd(sum, exemplarEmbedding);
    const nextCount = count + 1;
    const centroid = vectorScale(nextSum, 1 / nextCount);
    const drift = previous && previous.length > 0 ? cosineSimilarity(previous, centroid) : 1.0;

    const entities: GraphEntity[] = [
      {
        ...concept,
        embedding: centroid,
        props: { ...concept.props, [PROP.EMBEDDING_SUM]: nextSum, [PROP.EXEMPLAR_COUNT]: nextCount },
      },
    ];
    if (exemplarUuid) {
      entities.push(createEdge(conceptUuid, exemplarUuid, REL.HAS_EXEMPLAR, { order: nextCount - 1 }));
    }
    await this.graph.save(entities, provenance);

    this.graph.tracer?.logEvent(provenance.traceId, 'centroid_update', {
      conceptUuid,
      exemplarCount: nextCount,
      drift,
    });
    return { updated: true, exemplarCount: nextCount, embeddingDrift: drift };
  }

  /** Rebuild the running sum from exemplars linked by `has_exemplar`. */
  async recomputeCentroid(
    conceptUuid: string,
    provenance: Provenance = createProvenance('system'),
  ): Promise<CentroidRecompute> {
    const concept = await this.graph.getConcept(conceptUuid);
    if (!concept) return { recomputed: false, exemplarCount: 0, error: `Concept not found: ${conceptUuid}` };

    let sum: number[] = [];
    let count = 0;
    for (const edge of await this.graph.edgesFrom(conceptUuid, REL.HAS_EXEMPLAR)) {
      const exemplar = await this.graph.getConcept(edge.toNode);
      if (!exemplar?.embedding || exemplar.embedding.length === 0) continue;
      sum = vectorAdd(sum, exemplar.embedding);
      count++;
    }
    if (count === 0) return { recomputed: false, exemplarCount: 0, error: 'No exemplars with embeddings' };

    await this.graph.save(
      [
        {
          ...concept,
          embedding: vectorScale(sum, 1 / count),
          props: { ...concept.props, [PROP.EMBEDDING_SUM]: sum, [PROP.EXEMPLAR_COUNT]: count },
        },
      ],
      provenance,
    );
    return { recomputed: true, exemplarCount: count };
  }

  async getCentroid(conceptUuid: string): Promise<Centroid | null> {
    const concept = await this.graph.getConcept(conceptUuid);
    if (!concept?.embedding) return null;
    return {
      embedding: concept.embedding,
      exemplarCount: readNumber(concept.props, PROP.EXEMPLAR_COUNT) ?? 1,
    };
  }
}
