import {
  DEFAULT_CONFIG,
  REL,
  createEdge,
  createProvenance,
  errorMessage,
  isRecord,
  type MappingSource,
  type PatternData,
  type Provenance,
  type ReasoningFn,
  type TargetContext,
  type TransferResult,
} from '@sinew/shared';
import type { KnowledgeGraph } from '../knowledge-graph.js';
import { fingerprint, tokenize } from './fingerprint.js';
import { readPatternData, stringRecord } from './pattern-data.js';
import type { PatternStore } from './pattern-store.js';

const ACCEPT_RATIO = 0.5;
const FALLBACK_CONFIDENCE = 0.5;

export interface PatternTransferOptions {
  /** Minimum confidence for the adapted pattern to be stored. */
  transferThreshold?: number;
}

/**
 * Map target fields to source fields by normalised name. Returns
 * target -> source; a target with no candidate above the ratio is left out.
 */
export function simpleFieldMapping(sourceFields: string[], targetFields: string[]): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const target of targetFields) {
    const t = normalize(target);
    let best: { source: string; score: number } | undefined;
    for (const source of sourceFields) {
      const s = normalize(source);
      if (!s || !t) continue;
      let score = 0;
      if (s === t) score = 1;
      else if (s.includes(t) || t.includes(s)) score = Math.min(s.length, t.length) / Math.max(s.length, t.length);
      if (score > ACCEPT_RATIO && (!best || score > best.score)) best = { source, score };
    }
    if (best) mapping[target] = best.source;
  }
  return mapping;
}

export class PatternTransfer {
  private threshold: number;

  constructor(
    private graph: KnowledgeGraph,
    private patterns: PatternStore,
    options: PatternTransferOptions = {},
  ) {
    this.threshold = options.transferThreshold ?? DEFAULT_CONFIG.evolution.transferThreshold;
  }

  async transferPattern(
    sourceUuid: string,
    target: TargetContext,
    reasoning?: ReasoningFn,
    provenance: Provenance = createProvenance('system'),
  ): Promise<TransferResult> {
    const source = await this.graph.getConcept(sourceUuid);
    const sourceData = source ? readPatternData(source) : null;
    if (!source || !sourceData) {
      return {
        adaptedPattern: null,
        fieldMapping: {},
        confidence: 0,
        mappingSource: 'fallback',
        error: `Source pattern not found: ${sourceUuid}`,
      };
    }

    const { fieldMapping, confidence, mappingSource } = await this.mapFields(
      sourceData.fields,
      target.fields,
      reasoning,
      provenance.traceId,
    );
    const adaptedPattern = adaptPattern(sourceData, target, fieldMapping, confidence);
    const result: TransferResult = { adaptedPattern, fieldMapping, confidence, mappingSource };

    this.graph.tracer?.logEvent(provenance.traceId, 'pattern_transfer', {
      sourceUuid,
      confidence,
      mappingSource,
      mapped: Object.keys(fieldMapping).length,
    });

    if (confidence >= this.threshold) {
      const sourceName = typeof source.props.name === 'string' ? source.props.name : 'pattern';
      const stored = await this.patterns.save(target.name ?? `${sourceName} (adapted)`, adaptedPattern, provenance, {
        transferred_from: sourceUuid,
      });
      await this.graph.link(
        sourceUuid,
        stored.uuid,
        REL.TRANSFERRED_TO,
        { field_mapping: fieldMapping, confidence },
        provenance,
      );
      result.newPatternUuid = stored.uuid;
    }
    return result;
  }

  private async mapFields(
    sourceFields: string[],
    targetFields: string[],
    reasoning: ReasoningFn | undefined,
    traceId: string,
  ): Promise<{ fieldMapping: Record<string, string>; confidence: number; mappingSource: MappingSource }> {
    const heuristic = simpleFieldMapping(sourceFields, targetFields);

    if (!reasoning) {
      const confidence = targetFields.length === 0 ? 0 : Object.keys(heuristic).length / targetFields.length;
      return { fieldMapping: heuristic, confidence, mappingSource: 'heuristic' };
    }

    try {
      const reply = await reasoning(buildMappingPrompt(sourceFields, targetFields));
      const parsed = parseMappingReply(reply);
      if (parsed) return { ...parsed, mappingSource: 'reasoning' };
      this.graph.tracer?.logDegradation(traceId, 'unparsable reasoning reply', { reply });
    } catch (err) {
      this.graph.tracer?.logDegradation(traceId, 'reasoning function failed', { error: errorMessage(err) });
    }
    return { fieldMapping: heuristic, confidence: FALLBACK_CONFIDENCE, mappingSource: 'fallback' };
  }
}

export function buildMappingPrompt(sourceFields: string[], targetFields: string[]): string {
  return [
    'Map each target form field to the source form field with the same meaning.',
    `Source fields: ${sourceFields.join(', ')}`,
    `Target fields: ${targetFields.join(', ')}`,
    'Reply with JSON: {"field_mapping": {"<target>": "<source>"}, "confidence": <0..1>}',
  ].join('\n');
}

/** Pull `{ field_mapping, confidence }` out of a free-text reply. */
export function parseMappingReply(reply: string): { fieldMapping: Record<string, string>; confidence: number } | null {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(reply.slice(start, end + 1));
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !isRecord(parsed.field_mapping) || typeof parsed.confidence !== 'number') return null;
  return {
    fieldMapping: stringRecord(parsed.field_mapping),
    confidence: Math.min(1, Math.max(0, parsed.confidence)),
  };
}

function adaptPattern(
  source: PatternData,
  target: TargetContext,
  mapping: Record<string, string>,
  confidence: number,
): PatternData {
  // mapping is target -> source; templates are rewritten source -> target
  const replacements = new Map<string, string>();
  for (const [t, s] of Object.entries(mapping)) replacements.set(s, t);
  const substitute = substituter(replacements);

  const selectors: Record<string, string> = {};
  for (const [key, value] of Object.entries(source.selectors)) {
    selectors[replacements.get(key) ?? key] = substitute(value);
  }

  const url = target.url ?? (source.url ? substitute(source.url) : undefined);
  const fp = fingerprint(url, '');
  const tokens = new Set([...fp.tokens, ...target.fields.flatMap(f => tokenize(f))]);

  return {
    fingerprint: { ...fp, tokens: [...tokens].sort() },
    form_type: target.formType ?? source.form_type,
    fields: [...target.fields],
    selectors,
    steps: source.steps.map(step => substituteDeep(step, substitute)),
    url,
    confidence,
  };
}

function substituter(replacements: Map<string, string>): (text: string) => string {
  if (replacements.size === 0) return text => text;
  const names = [...replacements.keys()].sort((a, b) => b.length - a.length).map(escapeRegExp);
  const alternation = names.join('|');
  const re = new RegExp(`\\{(${alternation})\\}|(?<![\\w-])(${alternation})(?![\\w-])`, 'g');
  return text =>
    text.replace(re, (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      return name === undefined ? match : (replacements.get(name) ?? match);
    });
}

function substituteDeep(value: Record<string, unknown>, substitute: (text: string) => string): Record<string, unknown> {
  const walk = (v: unknown): unknown => {
    if (typeof v === 'string') return substitute(v);
    if (Array.isArray(v)) return v.map(walk);
    if (isRecord(v)) {
      const out: Record<string, unknown> = {};
      for (const [k, inner] of Object.entries(v)) out[k] = walk(inner);
      return out;
    }
    return v;
  };
  const out: Record<string, unknown> = {};
  for (const [k, inner] of Object.entries(value)) out[k] = walk(inner);
  return out;
}

function normalize(field: string): string {
  return field.toLowerCase().replace(/[_\s]+/g, '');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
