import {
  DEFAULT_CONFIG,
  EXHAUSTIVE_TOP_K,
  GENERALIZED_TYPE,
  PROP,
  REL,
  computeCentroid,
  cosineSimilarity,
  createConcept,
  createEdge,
  createProvenance,
  errorMessage,
  generateId,
  isRecord,
  readNumber,
  readString,
  type Concept,
  type GeneralizeResult,
  type GraphEntity,
  type Props,
  type Provenance,
  type ReasoningFn,
  type SimilarPattern,
} from '@sinew/shared';
import type { KnowledgeGraph } from '../knowledge-graph.js';
import { tokenize } from './fingerprint.js';
import { hasEmbedding, readPatternData } from './pattern-data.js';

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'of', 'to', 'for', 'in', 'on', 'with', 'at',
  'by', 'from', 'as', 'is', 'are', 'be', 'this', 'that', 'it', 'its', 'my',
  'your', 'our', 'new', 'v1', 'v2', 'page', 'form',
]);

export interface AutoGeneralizeOptions {
  minSimilar?: number;
  minSimilarity?: number;
  reasoning?: ReasoningFn;
  provenance?: Provenance;
}

export interface GeneralizerOptions {
  defaultSimilarity?: number;
  /** Share of exemplars a selector or step must appear in to be kept. */
  commonThreshold?: number;
  minSimilar?: number;
  minSimilarity?: number;
}

export interface GeneralizeConceptsOptions {
  kind?: string;
  props?: Props;
  provenance?: Provenance;
}

/** Folds successful, similar concepts into a shared generalized parent. */
export class Generalizer {
  private settings: Required<GeneralizerOptions>;

  constructor(
    private graph: KnowledgeGraph,
    options: GeneralizerOptions = {},
  ) {
    const defaults = DEFAULT_CONFIG.evolution;
    this.settings = {
      defaultSimilarity: options.defaultSimilarity ?? defaults.defaultSimilarity,
      commonThreshold: options.commonThreshold ?? defaults.commonThreshold,
      minSimilar: options.minSimilar ?? defaults.minSimilar,
      minSimilarity: options.minSimilarity ?? defaults.minSimilarity,
    };
  }

  /**
   * Generalize `uuid` with its successful peers. Returns null when the concept
   * is missing, already generalized or has too few peers.
   */
  async autoGeneralize(uuid: string, options: AutoGeneralizeOptions = {}): Promise<GeneralizeResult | null> {
    const minSimilar = options.minSimilar ?? this.settings.minSimilar;
    const minSimilarity = options.minSimilarity ?? this.settings.minSimilarity;
    const provenance = options.provenance ?? createProvenance('system');

    const concept = await this.graph.getConcept(uuid);
    if (!concept || concept.props.type === GENERALIZED_TYPE) return null;
    if ((await this.graph.edgesFrom(uuid, REL.GENERALIZED_BY)).length > 0) return null;

    const peers = await this.findPeers(concept, minSimilarity);
    if (peers.length < minSimilar - 1) return null;

    const exemplars = [concept, ...peers];
    const embedding = computeCentroid(exemplars.filter(hasEmbedding).map(e => e.embedding));
    const naming = await this.nameGroup(exemplars, options.reasoning, provenance.traceId);
    const commonSelectors = this.commonSelectors(exemplars);
    const commonSteps = this.commonSteps(exemplars);

    const generalizedUuid = await this.generalizeConcepts(
      exemplars.map(e => e.uuid),
      naming.name,
      naming.description,
      embedding.length > 0 ? embedding : undefined,
      readString(concept.props, PROP.PROTOTYPE_UUID),
      {
        kind: concept.kind,
        props: { common_selectors: commonSelectors, common_steps: commonSteps },
        provenance,
      },
    );

    this.graph.tracer?.logEvent(provenance.traceId, 'generalization', {
      generalizedUuid,
      name: naming.name,
      exemplarCount: exemplars.length,
    });

    return {
      generalizedUuid,
      name: naming.name,
      description: naming.description,
      exemplarUuids: exemplars.map(e => e.uuid),
      exemplarCount: exemplars.length,
      commonSelectors,
      commonSteps,
      namingSource: naming.source,
    };
  }

  /**
   * Create the parent concept plus `has_exemplar` edges to each exemplar and
   * `generalized_by` edges back. Returns the parent's uuid.
   */
  async generalizeConcepts(
    exemplarUuids: string[],
    name: string,
    description: string,
    embedding?: number[],
    prototypeUuid?: string,
    options: GeneralizeConceptsOptions = {},
  ): Promise<string> {
    const provenance = options.provenance ?? createProvenance('system');
    const props: Props = {
      ...options.props,
      name,
      description,
      type: GENERALIZED_TYPE,
      exemplar_count: exemplarUuids.length,
    };
    if (prototypeUuid) props[PROP.PROTOTYPE_UUID] = prototypeUuid;

    const parent = createConcept({ kind: options.kind ?? 'Concept', labels: [name, GENERALIZED_TYPE], props, embedding });
    const entities: GraphEntity[] = [parent];
    exemplarUuids.forEach((exemplar, order) => {
      entities.push(createEdge(parent.uuid, exemplar, REL.HAS_EXEMPLAR, { order }));
      entities.push(createEdge(exemplar, parent.uuid, REL.GENERALIZED_BY, { generalized_name: name }));
    });
    if (prototypeUuid) entities.push(createEdge(parent.uuid, prototypeUuid, REL.INSTANTIATES));

    await this.graph.save(entities, provenance);
    return parent.uuid;
  }

  async findGeneralizedPattern(query: string, topK = 5): Promise<SimilarPattern[]> {
    const embedding = this.graph.canEmbed ? await this.graph.embed(query, generateId('trace')) : undefined;
    const hits = await this.graph.searchConcepts(query, {
      topK: EXHAUSTIVE_TOP_K,
      filters: { 'props.type': GENERALIZED_TYPE },
      embedding,
    });

    const results: SimilarPattern[] = [];
    for (const { concept, score } of hits) {
      if (!embedding && score === 0 && query.trim() !== '') continue;
      const similarity =
        embedding && hasEmbedding(concept) ? cosineSimilarity(embedding, concept.embedding) : this.settings.defaultSimilarity;
      results.push({ uuid: concept.uuid, concept, similarity });
    }
    return results.sort((a, b) => b.similarity - a.similarity).slice(0, topK);
  }

  private async findPeers(concept: Concept, minSimilarity: number): Promise<Concept[]> {
    const text = readString(concept.props, 'name') ?? concept.labels.join(' ');
    const hits = await this.graph.searchConcepts(text, {
      topK: EXHAUSTIVE_TOP_K,
      filters: { kind: concept.kind },
      embedding: concept.embedding,
    });

    const peers: Concept[] = [];
    for (const { concept: peer, score } of hits) {
      if (peer.uuid === concept.uuid || peer.props.type === GENERALIZED_TYPE) continue;
      if ((readNumber(peer.props, PROP.SUCCESS_COUNT) ?? 0) <= 0) continue;
      const bothEmbedded = hasEmbedding(concept) && hasEmbedding(peer);
      if (!bothEmbedded && score === 0) continue;
      const similarity = bothEmbedded ? score : this.settings.defaultSimilarity;
      if (similarity >= minSimilarity) peers.push(peer);
    }
    return peers;
  }

  private async nameGroup(
    exemplars: Concept[],
    reasoning: ReasoningFn | undefined,
    traceId: string,
  ): Promise<{ name: string; description: string; source: 'reasoning' | 'tokens' }> {
    const names = exemplars.map(e => readString(e.props, 'name') ?? e.labels[0] ?? e.uuid);

    if (reasoning) {
      try {
        const reply = await reasoning(
          `Name the common pattern behind these items: ${names.join('; ')}. ` +
            'Reply with JSON: {"name": "...", "description": "..."}',
        );
        const parsed = parseNaming(reply);
        if (parsed) return { ...parsed, source: 'reasoning' };
        this.graph.tracer?.logDegradation(traceId, 'unparsable reasoning reply', { reply });
      } catch (err) {
        this.graph.tracer?.logDegradation(traceId, 'reasoning function failed', { error: errorMessage(err) });
      }
    }

    const tokenSets = names.map(n => new Set(tokenize(n).filter(t => !STOP_WORDS.has(t))));
    const [first, ...rest] = tokenSets;
    const common = [...(first ?? [])].filter(t => rest.every(set => set.has(t)));
    const name = common.length > 0 ? common.map(capitalize).join(' ') : `Generalized ${names[0]}`;
    return {
      name,
      description: `Generalized from ${names.length} exemplars: ${names.join(', ')}`,
      source: 'tokens',
    };
  }

  private commonSelectors(exemplars: Concept[]): Record<string, string> {
    const counts = new Map<string, { key: string; value: string; count: number }>();
    for (const exemplar of exemplars) {
      const selectors = readPatternData(exemplar)?.selectors ?? {};
      for (const [key, value] of Object.entries(selectors)) {
        const id = `${key}\u0000${value}`;
        const entry = counts.get(id) ?? { key, value, count: 0 };
        entry.count++;
        counts.set(id, entry);
      }
    }
    const common: Record<string, string> = {};
    for (const { key, value, count } of counts.values()) {
      if (this.isCommon(count, exemplars.length) && !(key in common)) common[key] = value;
    }
    return common;
  }

  private commonSteps(exemplars: Concept[]): Array<Record<string, unknown>> {
    const counts = new Map<string, { step: Record<string, unknown>; count: number }>();
    for (const exemplar of exemplars) {
      const seen = new Set<string>();
      for (const step of readPatternData(exemplar)?.steps ?? []) {
        const id = JSON.stringify(step);
        if (seen.has(id)) continue;
        seen.add(id);
        const entry = counts.get(id) ?? { step, count: 0 };
        entry.count++;
        counts.set(id, entry);
      }
    }
    return [...counts.values()].filter(e => this.isCommon(e.count, exemplars.length)).map(e => e.step);
  }

  private isCommon(count: number, total: number): boolean {
    return total > 0 && count / total >= this.settings.commonThreshold;
  }
}

function parseNaming(reply: string): { name: string; description: string } | null {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  try {
    const parsed: unknown = JSON.parse(reply.slice(start, end + 1));
    if (!isRecord(parsed) || typeof parsed.name !== 'string' || !parsed.name.trim()) return null;
    return {
      name: parsed.name.trim(),
      description: typeof parsed.description === 'string' ? parsed.description : '',
    };
  } catch {
    return null;
  }
}

function capitalize(token: string): string {
  return token.charAt(0).toUpperCase() + token.slice(1);
}
