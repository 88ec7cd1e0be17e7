import {
  DEFAULT_CONFIG,
  EXHAUSTIVE_TOP_K,
  cosineSimilarity,
  generateId,
  type PatternMatch,
  type SimilarPattern,
} from '@sinew/shared';
import type { KnowledgeGraph } from '../knowledge-graph.js';
import { fingerprint, jaccard } from './fingerprint.js';
import { hasEmbedding, patternType, readPatternData } from './pattern-data.js';

export interface SimilarPatternOptions {
  patternType?: string;
  topK?: number;
  minSimilarity?: number;
  exclude?: string[];
}

export interface PatternMatcherOptions {
  /** Similarity assigned when either side has no embedding. */
  defaultSimilarity?: number;
}

export class PatternMatcher {
  private defaultSimilarity: number;

  constructor(
    private graph: KnowledgeGraph,
    options: PatternMatcherOptions = {},
  ) {
    this.defaultSimilarity = options.defaultSimilarity ?? DEFAULT_CONFIG.evolution.defaultSimilarity;
  }

  /** Rank stored patterns by `2×domain + 0.5×type + jaccard(tokens)`. */
  async findBestPattern(url: string, html: string, formType?: string, topK = 5): Promise<PatternMatch[]> {
    const target = fingerprint(url, html);
    const hits = await this.graph.searchConcepts('', {
      topK: EXHAUSTIVE_TOP_K,
      filters: { kind: 'Pattern' },
    });

    const matches: PatternMatch[] = [];
    for (const { concept } of hits) {
      const patternData = readPatternData(concept);
      if (!patternData) continue;
      const fp = patternData.fingerprint;
      const domainMatch = fp.domain !== '' && fp.domain === target.domain ? 1 : 0;
      const typeMatch = formType !== undefined && patternData.form_type === formType ? 1 : 0;
      const score = 2 * domainMatch + 0.5 * typeMatch + jaccard(fp.tokens, target.tokens);
      matches.push({ score, concept, patternData });
    }

    return matches.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  /**
   * Fuzzy search over patterns. Uses the query embedding when one can be
   * computed; otherwise every text hit gets the default similarity.
   */
  async findSimilarPatterns(query: string, options: SimilarPatternOptions = {}): Promise<SimilarPattern[]> {
    const topK = options.topK ?? 5;
    const minSimilarity = options.minSimilarity ?? 0;
    const exclude = new Set(options.exclude ?? []);
    const embedding = this.graph.canEmbed ? await this.graph.embed(query, generateId('trace')) : undefined;

    const hits = await this.graph.searchConcepts(query, {
      topK: EXHAUSTIVE_TOP_K,
      filters: { kind: 'Pattern' },
      embedding,
    });

    const results: SimilarPattern[] = [];
    for (const { concept, score } of hits) {
      if (exclude.has(concept.uuid)) continue;
      if (options.patternType && patternType(concept) !== options.patternType) continue;
      if (!embedding && score === 0 && query.trim() !== '') continue;

      const similarity =
        embedding && hasEmbedding(concept) ? cosineSimilarity(embedding, concept.embedding) : this.defaultSimilarity;
      if (similarity < minSimilarity) continue;
      results.push({ uuid: concept.uuid, concept, similarity });
    }

    return results.sort((a, b) => b.similarity - a.similarity).slice(0, topK);
  }
}
