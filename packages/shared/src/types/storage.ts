import type { GraphEntity, Provenance } from './graph.js';

export type UpsertResult =
  | { status: 'success'; uuid: string }
  | { status: 'error'; uuid: string; error: string };

export type FilterValue = string | number | boolean | null;

/**
 * Exact-match filters on shallow entity fields (`entity`, `uuid`, `kind`,
 * `status`, `fromNode`, `toNode`, `rel`) or on a top-level prop via `props.<key>`.
 */
export type SearchFilters = Record<string, FilterValue>;

export interface SearchQuery {
  text: string;
  topK: number;
  filters?: SearchFilters;
  embedding?: number[];
}

export type SearchRecord = GraphEntity & { score: number };

export interface UpsertEntry {
  entity: GraphEntity;
  provenance: Provenance;
}

/**
 * Persistence contract consumed by the core. `upsert` reports failure through
 * its result and never rejects.
 */
export interface GraphStore {
  upsert(entity: GraphEntity, provenance: Provenance): Promise<UpsertResult>;
  search(query: SearchQuery): Promise<SearchRecord[]>;
  /** Atomic batch write, for backends that support transactions. */
  upsertMany?(entries: UpsertEntry[]): Promise<UpsertResult[]>;
}

export type EmbedFn = (text: string) => number[] | Promise<number[]>;

export type ReasoningFn = (prompt: string) => string | Promise<string>;
