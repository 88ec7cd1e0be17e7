import type { Concept } from './graph.js';

export interface Fingerprint {
  version: 1;
  domain: string;
  path: string;
  tokens: string[];
}

export interface PatternData {
  fingerprint: Fingerprint;
  form_type: string;
  fields: string[];
  selectors: Record<string, string>;
  steps: Array<Record<string, unknown>>;
  url?: string;
  confidence: number;
}

export interface PatternInput {
  name: string;
  url: string;
  html: string;
  formType: string;
  fields: string[];
  selectors?: Record<string, string>;
  steps?: Array<Record<string, unknown>>;
  confidence?: number;
}

export interface PatternMatch {
  score: number;
  concept: Concept;
  patternData: PatternData;
}

export interface SimilarPattern {
  uuid: string;
  concept: Concept;
  similarity: number;
}

export interface TargetContext {
  url?: string;
  fields: string[];
  formType?: string;
  name?: string;
}

export type MappingSource = 'heuristic' | 'reasoning' | 'fallback';

export interface TransferResult {
  adaptedPattern: PatternData | null;
  fieldMapping: Record<string, string>;
  confidence: number;
  mappingSource: MappingSource;
  newPatternUuid?: string;
  error?: string;
}

export interface SuccessRecord {
  successCount: number;
  lastSuccessAt?: string;
  error?: string;
}

export interface GeneralizeResult {
  generalizedUuid: string;
  name: string;
  description: string;
  exemplarUuids: string[];
  exemplarCount: number;
  commonSelectors: Record<string, string>;
  commonSteps: Array<Record<string, unknown>>;
  namingSource: 'reasoning' | 'tokens';
}

export interface CentroidUpdate {
  updated: boolean;
  exemplarCount: number;
  embeddingDrift: number;
  error?: string;
}

export interface CentroidRecompute {
  recomputed: boolean;
  exemplarCount: number;
  error?: string;
}
