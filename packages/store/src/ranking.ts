import {
  cosineSimilarity,
  type GraphEntity,
  type SearchFilters,
  type SearchQuery,
  type SearchRecord,
} from '@sinew/shared';

const TEXT_SUBSTRING_SCORE = 0.8;
const TEXT_WORD_SCORE = 0.5;

/** Shallow field lookup used by filters; `props.<key>` reads a top-level prop. */
export function fieldValue(entity: GraphEntity, key: string): unknown {
  if (key.startsWith('props.')) return entity.props[key.slice('props.'.length)];
  switch (key) {
    case 'entity':
      return entity.entity;
    case 'uuid':
      return entity.uuid;
    case 'kind':
      return entity.entity === 'concept' ? entity.kind : undefined;
    case 'status':
      return entity.entity === 'concept' ? entity.status : undefined;
    case 'fromNode':
      return entity.entity === 'edge' ? entity.fromNode : undefined;
    case 'toNode':
      return entity.entity === 'edge' ? entity.toNode : undefined;
    case 'rel':
      return entity.entity === 'edge' ? entity.rel : undefined;
    default:
      return undefined;
  }
}

export function matchesFilters(entity: GraphEntity, filters?: SearchFilters): boolean {
  if (!filters) return true;
  for (const [key, expected] of Object.entries(filters)) {
    const actual = fieldValue(entity, key) ?? null;
    if (actual !== expected) return false;
  }
  return true;
}

export function searchableText(entity: GraphEntity): string {
  const parts: string[] = [];
  if (entity.entity === 'concept') {
    parts.push(entity.kind, ...entity.labels);
  } else {
    parts.push(entity.rel);
  }
  for (const value of Object.values(entity.props)) {
    if (typeof value === 'string') parts.push(value);
  }
  return parts.join(' ').toLowerCase();
}

export function textScore(query: string, text: string): number {
  const q = query.trim().toLowerCase();
  if (!q) return 0;
  if (text.includes(q)) return TEXT_SUBSTRING_SCORE;
  const words = q.split(/\s+/).filter(Boolean);
  return words.some(w => text.includes(w)) ? TEXT_WORD_SCORE : 0;
}

/**
 * Score and order candidates. With a query embedding, concepts carrying an
 * embedding rank by cosine similarity; everything else by text score. The sort
 * is stable so equal scores keep insertion order.
 */
export function rankEntities(candidates: GraphEntity[], query: SearchQuery): SearchRecord[] {
  const scored = candidates.map(entity => {
    const score = query.embedding && entity.entity === 'concept' && entity.embedding
      ? cosineSimilarity(query.embedding, entity.embedding)
      : textScore(query.text, searchableText(entity));
    return { ...structuredClone(entity), score };
  });
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.max(0, query.topK));
}
